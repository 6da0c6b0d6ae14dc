import { EntityPageRequest, EntitySourcePort } from '../../../application/ports/EntitySourcePort.js';

/**
 * Serves a fixed record list page by page. Used when no ledger credentials are
 * configured and as an in-process stand-in for the ledger in tests.
 */
export class InMemoryEntitySource implements EntitySourcePort {
  readonly requests: EntityPageRequest[] = [];

  constructor(
    readonly entity: string,
    private readonly records: readonly unknown[] = [],
  ) {}

  async list(request: EntityPageRequest): Promise<unknown[]> {
    this.requests.push({ ...request });

    const offset = request.startPosition - 1;
    return this.records.slice(offset, offset + request.pageSize);
  }
}
