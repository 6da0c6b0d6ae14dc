#!/usr/bin/env node
import { ReportRequestSchema } from './application/dto/ReportRunDTO.js';
import { resolveRequestedPeriod } from './application/services/resolveRequestedPeriod.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const USAGE = 'Usage: ledger-statements [--period monthly|quarterly|yearly|custom] [--start YYYY-MM-DD] [--end YYYY-MM-DD]';

const flagNames: Record<string, 'period' | 'startDate' | 'endDate'> = {
  '--period': 'period',
  '--start': 'startDate',
  '--end': 'endDate',
};

export const parseArgs = (argv: string[]): Record<string, string> => {
  const options: Record<string, string> = {};

  for (let index = 0; index < argv.length; index += 2) {
    const flag = argv[index];
    const value = argv[index + 1];
    const name = Object.hasOwn(flagNames, flag) ? flagNames[flag] : undefined;

    if (!name || value === undefined) {
      throw new Error(`Unexpected argument "${flag}". ${USAGE}`);
    }

    options[name] = value;
  }

  return options;
};

const main = async (): Promise<number> => {
  const request = ReportRequestSchema.parse(parseArgs(process.argv.slice(2)));
  const container = new AppContainer();
  const controller = new AbortController();

  process.once('SIGINT', () => {
    console.warn('⏹️ Cancelling report run...');
    controller.abort();
  });

  const report = await container.reportService.runWithCredentialRefresh({
    period: resolveRequestedPeriod(request),
    beginningCash: container.config.app.beginningCash,
    signal: controller.signal,
  });

  await container.renderer.render(report);

  const failures = [report.profitAndLoss, report.balanceSheet, report.cashFlow].filter(
    (outcome) => outcome.status === 'failed',
  );

  return failures.length > 0 ? 1 : 0;
};

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}
