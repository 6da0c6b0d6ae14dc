import { ReportRun } from '../../../application/dto/ReportRunDTO.js';
import { ConsoleStatementRenderer, formatAmount, formatReport } from './ConsoleStatementRenderer.js';

const row = (label: string, amount: string) => `${label.padEnd(40)}${amount.padStart(14)}`;

const report: ReportRun = {
  period: { startDate: '2025-01-01', endDate: '2025-03-31' },
  generatedAt: '2025-04-02T09:30:00.000Z',
  recordCounts: { invoices: 1, bills: 1, accounts: null },
  profitAndLoss: {
    status: 'succeeded',
    statement: {
      shape: 'categorized',
      revenueDetail: { Consulting: 8000 },
      expenseDetail: { Rent: 2500 },
      totalRevenue: 8000,
      totalExpenses: 2500,
      grossProfit: 5500,
      netIncome: 5500,
      fallbacks: [],
    },
  },
  balanceSheet: {
    status: 'failed',
    error: { errorClass: 'FetchExhaustedError', message: 'Gave up after 5 attempts: Service unavailable' },
  },
  cashFlow: {
    status: 'succeeded',
    statement: {
      netIncome: 5500,
      operating: { 'Net Income': 5500 },
      investing: {},
      financing: { 'Loan Repayment': -1000 },
      netOperating: 5500,
      netInvesting: 0,
      netFinancing: -1000,
      netChangeInCash: 4500,
      beginningCash: 12000,
      endingCash: 16500,
    },
  },
};

describe('formatAmount', () => {
  test('groups thousands with two decimals', () => {
    expect(formatAmount(1234567.5)).toBe('1,234,567.50');
    expect(formatAmount(0)).toBe('0.00');
    expect(formatAmount(-42)).toBe('-42.00');
    expect(formatAmount(-0.001)).toBe('0.00');
  });
});

describe('formatReport', () => {
  test('prints each statement and the reason one is missing', () => {
    expect(formatReport(report)).toEqual([
      'Profit & Loss Statement',
      'Period: 2025-01-01 to 2025-03-31',
      'Revenue',
      row('  Consulting', '8,000.00'),
      row('Total Revenue', '8,000.00'),
      '',
      'Expenses',
      row('  Rent', '2,500.00'),
      row('Total Expenses', '2,500.00'),
      '',
      row('Gross Profit', '5,500.00'),
      row('Net Income', '5,500.00'),
      '',
      'Balance Sheet',
      'As of: 2025-03-31',
      '  Not available (FetchExhaustedError): Gave up after 5 attempts: Service unavailable',
      '',
      'Cash Flow Statement',
      'Period: 2025-01-01 to 2025-03-31',
      'Operating Activities',
      row('  Net Income', '5,500.00'),
      row('Net Cash from Operating Activities', '5,500.00'),
      '',
      'Investing Activities',
      row('Net Cash from Investing Activities', '0.00'),
      '',
      'Financing Activities',
      row('  Loan Repayment', '-1,000.00'),
      row('Net Cash from Financing Activities', '-1,000.00'),
      '',
      row('Net Change in Cash', '4,500.00'),
      row('Beginning Cash', '12,000.00'),
      row('Ending Cash', '16,500.00'),
    ]);
  });

  test('labels an unbounded run with all dates and the run date', () => {
    const lines = formatReport({
      ...report,
      period: null,
      balanceSheet: {
        status: 'succeeded',
        statement: {
          rows: [
            { kind: 'section-header', label: 'Bank', amount: null },
            { kind: 'detail', label: '  Checking', amount: 900 },
            { kind: 'spacer', label: '', amount: null },
          ],
          sectionTotals: { Assets: 900, Liabilities: 0, Equity: 0 },
          fallbacks: [],
        },
      },
    });

    expect(lines[1]).toBe('Period: All Dates');
    expect(lines.slice(13, 18)).toEqual(['Balance Sheet', 'As of: 2025-04-02', 'Bank', row('  Checking', '900.00'), '']);
  });
});

describe('ConsoleStatementRenderer', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('writes the formatted report to the console', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await new ConsoleStatementRenderer().render(report);

    expect(log).toHaveBeenCalledWith(formatReport(report).join('\n'));
  });
});
