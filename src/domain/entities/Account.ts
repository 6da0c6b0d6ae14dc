export type BalanceSheetSection = 'Asset' | 'Liability' | 'Equity' | 'Unclassified';

export interface Account {
  readonly id: string;
  readonly name: string;
  readonly currentBalance: number;
  readonly accountType: string | null; // declared type tag, e.g. "Accounts Receivable"
  readonly accountSubType?: string;
  readonly active?: boolean;
}

export interface AccountClassification {
  section: BalanceSheetSection;
  subgroup: string;
}
