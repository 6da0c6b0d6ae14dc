import { InvalidPeriodError, PeriodPreset, ReportPeriod, resolveReportPeriod } from '../../domain/services/ReportPeriod.js';

export interface RequestedPeriod {
  period?: PeriodPreset;
  startDate?: string;
  endDate?: string;
}

/**
 * A preset wins; a start and end date without a preset means a custom range;
 * nothing at all means every date.
 */
export const resolveRequestedPeriod = (requested: RequestedPeriod, today: Date = new Date()): ReportPeriod | undefined => {
  if (requested.period) {
    return resolveReportPeriod(requested.period, today, requested);
  }

  if (requested.startDate || requested.endDate) {
    if (!requested.startDate || !requested.endDate) {
      throw new InvalidPeriodError('startDate and endDate must be given together');
    }

    return resolveReportPeriod('custom', today, requested);
  }

  return undefined;
};
