export type StatementRowKind = 'section-header' | 'detail' | 'subtotal' | 'total' | 'spacer';

export type StatementRow =
  | { kind: 'section-header'; label: string; amount: null }
  | { kind: 'spacer'; label: ''; amount: null }
  | { kind: 'detail' | 'subtotal' | 'total'; label: string; amount: number };

export type SectionTotalKey = 'Assets' | 'Liabilities' | 'Equity' | 'Unclassified';

export type CategoryAmounts = Record<string, number>;

/**
 * A degrade-to-default event. Recorded for observability, never raised.
 */
export interface ClassificationFallback {
  subject: 'line' | 'account';
  reference: string;
  reason: 'no-detail' | 'unnamed-reference' | 'detail-mismatch' | 'unknown-account-type';
  appliedLabel: string;
}

export interface CategorizedProfitAndLoss {
  shape: 'categorized';
  revenueDetail: CategoryAmounts;
  expenseDetail: CategoryAmounts;
  totalRevenue: number;
  totalExpenses: number;
  // No COGS split exists yet, so gross profit always equals net income.
  grossProfit: number;
  netIncome: number;
  fallbacks: ClassificationFallback[];
}

export interface FlatProfitAndLoss {
  shape: 'flat';
  totalRevenue: number;
  totalExpenses: number;
  netIncome: number;
}

export type ProfitAndLoss = CategorizedProfitAndLoss | FlatProfitAndLoss;

export interface BalanceSheet {
  rows: StatementRow[];
  sectionTotals: Partial<Record<SectionTotalKey, number>> & Record<'Assets' | 'Liabilities' | 'Equity', number>;
  fallbacks: ClassificationFallback[];
}

export interface CashFlowStatement {
  netIncome: number;
  operating: CategoryAmounts;
  investing: CategoryAmounts;
  financing: CategoryAmounts;
  netOperating: number;
  netInvesting: number;
  netFinancing: number;
  netChangeInCash: number;
  beginningCash: number;
  endingCash: number;
}
