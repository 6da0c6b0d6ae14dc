export type DocumentKind = 'invoice' | 'bill';

export interface EntityRef {
  value?: string;
  name?: string;
}

export type LineDetail =
  | { kind: 'sales'; itemRef: EntityRef | null }
  | { kind: 'account-expense'; accountRef: EntityRef | null }
  | { kind: 'item-expense'; itemRef: EntityRef | null }
  | { kind: 'none' };

export interface TransactionLine {
  readonly id?: string;
  readonly amount: number;
  readonly description?: string;
  readonly detail: LineDetail;
}

export interface LedgerDocument {
  readonly kind: DocumentKind;
  readonly id: string;
  readonly counterparty: string | null;
  readonly txnDate: string | null; // YYYY-MM-DD
  readonly totalAmount: number;
  readonly balance: number;
  readonly lines: readonly TransactionLine[];
}

export interface DocumentSummary {
  id: string;
  counterparty: string | null;
  txnDate: string | null;
  totalAmount: number;
  balance: number;
}
