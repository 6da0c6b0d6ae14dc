export interface EntityPageRequest {
  filter?: string;
  startPosition: number; // 1-based
  pageSize: number;
}

/**
 * One instance per entity kind (invoices, bills, accounts). Rejects with
 * AuthorizationError, InvalidQueryError or TransientServiceError.
 */
export interface EntitySourcePort {
  readonly entity: string;
  list(request: EntityPageRequest): Promise<unknown[]>;
}
