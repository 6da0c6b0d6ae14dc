import { ReportRun, StatementOutcome } from '../../../application/dto/ReportRunDTO.js';
import { StatementRendererPort } from '../../../application/ports/StatementRendererPort.js';
import {
  BalanceSheet,
  CashFlowStatement,
  CategoryAmounts,
  ProfitAndLoss,
} from '../../../domain/entities/Statement.js';
import { toCents } from '../../../domain/services/Money.js';

const LABEL_WIDTH = 40;
const AMOUNT_WIDTH = 14;

export const formatAmount = (amount: number): string => {
  const cents = Math.abs(toCents(amount));
  const whole = Math.floor(cents / 100)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const fraction = (cents % 100).toString().padStart(2, '0');

  return `${amount < 0 && cents > 0 ? '-' : ''}${whole}.${fraction}`;
};

const line = (label: string, amount?: number | null): string =>
  amount === undefined || amount === null
    ? label
    : `${label.padEnd(LABEL_WIDTH)}${formatAmount(amount).padStart(AMOUNT_WIDTH)}`;

const categoryLines = (amounts: CategoryAmounts): string[] =>
  Object.entries(amounts).map(([category, amount]) => line(`  ${category}`, amount));

const unavailable = <T>(outcome: StatementOutcome<T>): string[] =>
  outcome.status === 'failed' ? [`  Not available (${outcome.error.errorClass}): ${outcome.error.message}`] : [];

const profitAndLossLines = (statement: ProfitAndLoss): string[] => {
  if (statement.shape === 'flat') {
    return [
      line('Total Revenue', statement.totalRevenue),
      line('Total Expenses', statement.totalExpenses),
      line('Net Income', statement.netIncome),
    ];
  }

  return [
    'Revenue',
    ...categoryLines(statement.revenueDetail),
    line('Total Revenue', statement.totalRevenue),
    '',
    'Expenses',
    ...categoryLines(statement.expenseDetail),
    line('Total Expenses', statement.totalExpenses),
    '',
    line('Gross Profit', statement.grossProfit),
    line('Net Income', statement.netIncome),
  ];
};

const balanceSheetLines = (statement: BalanceSheet): string[] => statement.rows.map((row) => line(row.label, row.amount));

const cashFlowLines = (statement: CashFlowStatement): string[] => [
  'Operating Activities',
  ...categoryLines(statement.operating),
  line('Net Cash from Operating Activities', statement.netOperating),
  '',
  'Investing Activities',
  ...categoryLines(statement.investing),
  line('Net Cash from Investing Activities', statement.netInvesting),
  '',
  'Financing Activities',
  ...categoryLines(statement.financing),
  line('Net Cash from Financing Activities', statement.netFinancing),
  '',
  line('Net Change in Cash', statement.netChangeInCash),
  line('Beginning Cash', statement.beginningCash),
  line('Ending Cash', statement.endingCash),
];

export const formatReport = (report: ReportRun): string[] => {
  const periodLabel = report.period ? `${report.period.startDate} to ${report.period.endDate}` : 'All Dates';
  const asOf = report.period?.endDate ?? report.generatedAt.slice(0, 10);

  return [
    'Profit & Loss Statement',
    `Period: ${periodLabel}`,
    ...(report.profitAndLoss.status === 'succeeded'
      ? profitAndLossLines(report.profitAndLoss.statement)
      : unavailable(report.profitAndLoss)),
    '',
    'Balance Sheet',
    `As of: ${asOf}`,
    ...(report.balanceSheet.status === 'succeeded'
      ? balanceSheetLines(report.balanceSheet.statement)
      : unavailable(report.balanceSheet)),
    '',
    'Cash Flow Statement',
    `Period: ${periodLabel}`,
    ...(report.cashFlow.status === 'succeeded' ? cashFlowLines(report.cashFlow.statement) : unavailable(report.cashFlow)),
  ];
};

export class ConsoleStatementRenderer implements StatementRendererPort {
  async render(report: ReportRun): Promise<void> {
    console.log(formatReport(report).join('\n'));
  }
}
