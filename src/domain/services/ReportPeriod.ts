import dayjs, { Dayjs } from 'dayjs';

export type PeriodPreset = 'monthly' | 'quarterly' | 'yearly' | 'custom';

export interface ReportPeriod {
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
}

const DATE_FORMAT = 'YYYY-MM-DD';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class InvalidPeriodError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPeriodError';
  }
}

const parseIsoDate = (value: string | undefined, field: string): Dayjs => {
  const parsed = value && ISO_DATE.test(value) ? dayjs(value) : null;

  // dayjs rolls 2024-02-30 over to March, so compare the round trip.
  if (!parsed || !parsed.isValid() || parsed.format(DATE_FORMAT) !== value) {
    throw new InvalidPeriodError(`${field} must be a valid date in YYYY-MM-DD format (e.g., 2024-01-15)`);
  }

  return parsed;
};

/**
 * monthly: the previous calendar month. quarterly: the previous calendar quarter.
 * yearly: January 1st through today. custom: the given dates.
 */
export const resolveReportPeriod = (
  preset: PeriodPreset,
  today: Date = new Date(),
  custom: { startDate?: string; endDate?: string } = {},
): ReportPeriod => {
  const now = dayjs(today);

  switch (preset) {
    case 'monthly': {
      const lastMonth = now.startOf('month').subtract(1, 'month');
      return { startDate: lastMonth.format(DATE_FORMAT), endDate: lastMonth.endOf('month').format(DATE_FORMAT) };
    }
    case 'quarterly': {
      const currentQuarterStart = now.startOf('month').subtract(now.month() % 3, 'month');
      const start = currentQuarterStart.subtract(3, 'month');
      const end = currentQuarterStart.subtract(1, 'day');
      return { startDate: start.format(DATE_FORMAT), endDate: end.format(DATE_FORMAT) };
    }
    case 'yearly':
      return { startDate: now.startOf('year').format(DATE_FORMAT), endDate: now.format(DATE_FORMAT) };
    case 'custom': {
      const start = parseIsoDate(custom.startDate, 'startDate');
      const end = parseIsoDate(custom.endDate, 'endDate');

      if (start.isAfter(end)) {
        throw new InvalidPeriodError('startDate must not be after endDate');
      }

      return { startDate: start.format(DATE_FORMAT), endDate: end.format(DATE_FORMAT) };
    }
  }
};

export const buildTxnDateFilter = (period: ReportPeriod): string =>
  `TxnDate >= '${period.startDate}' AND TxnDate <= '${period.endDate}'`;
