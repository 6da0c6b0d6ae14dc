import { z } from 'zod';
import { ErrorClass } from '../../domain/errors/LedgerReportError.js';
import { BalanceSheet, CashFlowStatement, ProfitAndLoss } from '../../domain/entities/Statement.js';

const CategoryAmountsSchema = z.record(z.number().finite());

export const CashFlowAdjustmentsSchema = z.object({
  operating: CategoryAmountsSchema.optional(),
  investing: CategoryAmountsSchema.optional(),
  financing: CategoryAmountsSchema.optional(),
});

export type CashFlowAdjustmentsDTO = z.infer<typeof CashFlowAdjustmentsSchema>;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const ReportRequestSchema = z.object({
  period: z.enum(['monthly', 'quarterly', 'yearly', 'custom']).optional(),
  startDate: IsoDateSchema.optional(),
  endDate: IsoDateSchema.optional(),
  beginningCash: z.number().finite().optional(),
  cashFlow: CashFlowAdjustmentsSchema.optional(),
});

export type ReportRequestDTO = z.infer<typeof ReportRequestSchema>;

export type StatementName = 'profitAndLoss' | 'balanceSheet' | 'cashFlow';

export type StatementOutcome<T> =
  | { status: 'succeeded'; statement: T }
  | { status: 'failed'; error: { errorClass: ErrorClass | 'Error'; message: string } };

export interface ReportRun {
  period: { startDate: string; endDate: string } | null;
  generatedAt: string; // ISO timestamp
  recordCounts: { invoices: number | null; bills: number | null; accounts: number | null };
  profitAndLoss: StatementOutcome<ProfitAndLoss>;
  balanceSheet: StatementOutcome<BalanceSheet>;
  cashFlow: StatementOutcome<CashFlowStatement>;
}
