import { QueryResponseDTO, QueryResponseSchema } from '../../../application/dto/LedgerRecordDTO.js';
import { EntityPageRequest, EntitySourcePort } from '../../../application/ports/EntitySourcePort.js';
import { CredentialProviderPort } from '../../../application/ports/CredentialProviderPort.js';
import {
  AuthorizationError,
  InvalidQueryError,
  TransientServiceError,
} from '../../../domain/errors/LedgerReportError.js';
import { LedgerEnvironment } from '../../config/Config.js';
import { Transport, TransportResponse } from '../../http/FetchTransport.js';

export type QuickBooksEntity = 'Invoice' | 'Bill' | 'Account';

export interface QuickBooksSourceConfig {
  realmId: string;
  environment: LedgerEnvironment;
  baseUrl?: string;
  minorVersion?: string;
  timeoutMs?: number;
}

const AUTH_FAULTS = new Set(['AUTHENTICATION', 'AuthenticationFault', 'AuthorizationFault']);
const QUERY_FAULTS = new Set(['ValidationFault', 'QueryValidationError']);

const faultMessage = (fault: NonNullable<QueryResponseDTO['Fault']>): string =>
  fault.Error?.map((error) => [error.Message, error.Detail].filter(Boolean).join(': ')).join('; ') ||
  fault.type ||
  'unknown fault';

export const buildEntityQuery = (entity: QuickBooksEntity, request: EntityPageRequest): string =>
  [
    `SELECT * FROM ${entity}`,
    request.filter ? `WHERE ${request.filter}` : null,
    `STARTPOSITION ${request.startPosition}`,
    `MAXRESULTS ${request.pageSize}`,
  ]
    .filter((part): part is string => part !== null)
    .join(' ');

export class QuickBooksEntitySource implements EntitySourcePort {
  private readonly baseUrl: string;

  constructor(
    readonly entity: QuickBooksEntity,
    private readonly config: QuickBooksSourceConfig,
    private readonly credentials: CredentialProviderPort,
    private readonly transport: Transport,
  ) {
    this.baseUrl =
      config.baseUrl ??
      (config.environment === 'production'
        ? 'https://quickbooks.api.intuit.com'
        : 'https://sandbox-quickbooks.api.intuit.com');
  }

  async list(request: EntityPageRequest): Promise<unknown[]> {
    const query = buildEntityQuery(this.entity, request);
    const params = new URLSearchParams({ query, minorversion: this.config.minorVersion ?? '75' });
    const token = await this.credentials.currentCredential();

    let response: TransportResponse;
    try {
      response = await this.transport({
        url: `${this.baseUrl}/v3/company/${encodeURIComponent(this.config.realmId)}/query?${params.toString()}`,
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
        timeoutMs: this.config.timeoutMs,
      });
    } catch (error) {
      // Timeouts and connection failures.
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientServiceError(`${this.entity} request failed: ${message}`, undefined, { cause: error });
    }

    const parsed = QueryResponseSchema.safeParse(response.body);
    const body: QueryResponseDTO = parsed.success ? parsed.data : {};
    const fault = body.Fault;

    if (response.status === 401 || response.status === 403 || (fault?.type && AUTH_FAULTS.has(fault.type))) {
      throw new AuthorizationError(
        `${this.entity} request was not authorized${fault ? `: ${faultMessage(fault)}` : ''}`,
        response.status,
      );
    }

    if (response.status === 400 || (fault?.type && QUERY_FAULTS.has(fault.type))) {
      throw new InvalidQueryError(
        `${this.entity} query was rejected${fault ? `: ${faultMessage(fault)}` : ''}`,
        query,
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransientServiceError(`${this.entity} request failed with status ${response.status}`, response.status);
    }

    if (fault) {
      throw new TransientServiceError(`${this.entity} request failed: ${faultMessage(fault)}`, response.status);
    }

    // An empty page ends pagination, so a body without the envelope must not read as one.
    if (!parsed.success || !body.QueryResponse) {
      throw new TransientServiceError(`${this.entity} response was not a query response`, response.status);
    }

    const records = body.QueryResponse[this.entity];
    return Array.isArray(records) ? records : [];
  }
}
