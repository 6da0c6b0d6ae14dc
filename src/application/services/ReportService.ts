import { CashFlowStatement, ProfitAndLoss } from '../../domain/entities/Statement.js';
import {
  AuthorizationError,
  DependencyFailedError,
  errorClassOf,
  FetchCancelledError,
} from '../../domain/errors/LedgerReportError.js';
import { buildTxnDateFilter, ReportPeriod } from '../../domain/services/ReportPeriod.js';
import { CashFlowAdjustmentsDTO, ReportRun, StatementOutcome } from '../dto/ReportRunDTO.js';
import { CredentialProviderPort } from '../ports/CredentialProviderPort.js';
import { EntitySourcePort } from '../ports/EntitySourcePort.js';
import { LedgerRecordMapper } from './LedgerRecordMapper.js';
import { FetchAllOptions, PagedFetcher } from './PagedFetcher.js';
import { StatementAggregator } from './StatementAggregator.js';

export interface LedgerSources {
  invoices: EntitySourcePort;
  bills: EntitySourcePort;
  accounts: EntitySourcePort;
}

export interface RunReportParams {
  period?: ReportPeriod;
  beginningCash?: number;
  cashFlow?: CashFlowAdjustmentsDTO;
  signal?: AbortSignal;
  onRetry?: FetchAllOptions['onRetry'];
}

const NET_INCOME_LINE = 'Net Income';

const succeeded = <T>(statement: T): StatementOutcome<T> => ({ status: 'succeeded', statement });

const failed = <T>(error: unknown): StatementOutcome<T> => ({
  status: 'failed',
  error: { errorClass: errorClassOf(error), message: error instanceof Error ? error.message : String(error) },
});

export class ReportService {
  constructor(
    private readonly sources: LedgerSources,
    private readonly fetcher: PagedFetcher,
    private readonly mapper: LedgerRecordMapper,
    private readonly aggregator: StatementAggregator,
    private readonly credentials: CredentialProviderPort,
  ) {}

  async run(params: RunReportParams = {}): Promise<ReportRun> {
    const filter = params.period ? buildTxnDateFilter(params.period) : undefined;
    // One rejected credential cancels the sibling fetches instead of letting them back off to the end.
    const controller = new AbortController();
    const cancel = () => controller.abort();
    if (params.signal?.aborted) {
      cancel();
    }
    params.signal?.addEventListener('abort', cancel, { once: true });

    const fetchOptions = { signal: controller.signal, onRetry: params.onRetry };
    const failFast = (fetching: Promise<unknown[]>): Promise<unknown[]> =>
      fetching.catch((error: unknown) => {
        if (error instanceof AuthorizationError) {
          cancel();
        }

        throw error;
      });

    console.log(
      params.period
        ? `📊 Building statements for ${params.period.startDate} to ${params.period.endDate}`
        : '📊 Building statements for all dates',
    );

    const [invoices, bills, accounts] = await Promise.allSettled([
      failFast(this.fetcher.fetchAll(this.sources.invoices, { ...fetchOptions, filter })),
      failFast(this.fetcher.fetchAll(this.sources.bills, { ...fetchOptions, filter })),
      failFast(this.fetcher.fetchAll(this.sources.accounts, fetchOptions)),
    ]).finally(() => params.signal?.removeEventListener('abort', cancel));

    const reasons = [invoices, bills, accounts].flatMap((result): unknown[] =>
      result.status === 'rejected' ? [result.reason] : [],
    );
    // The authorization failure outranks the cancellations it caused.
    const fatal =
      reasons.find((reason) => reason instanceof AuthorizationError) ??
      reasons.find((reason) => reason instanceof FetchCancelledError);

    if (fatal) {
      throw fatal;
    }

    const profitAndLoss = this.buildStatement((): ProfitAndLoss => {
      const invoiceDocuments = this.mapper.mapInvoices(this.unwrap(invoices));
      const billDocuments = this.mapper.mapBills(this.unwrap(bills));

      return this.aggregator.buildProfitAndLoss(invoiceDocuments, billDocuments);
    });

    const balanceSheet = this.buildStatement(() =>
      this.aggregator.buildBalanceSheet(this.mapper.mapAccounts(this.unwrap(accounts))),
    );

    const cashFlow = this.buildStatement((): CashFlowStatement => {
      if (profitAndLoss.status === 'failed') {
        throw new DependencyFailedError('profitAndLoss', profitAndLoss.error.errorClass);
      }

      const { netIncome } = profitAndLoss.statement;

      if (params.cashFlow?.operating && Object.hasOwn(params.cashFlow.operating, NET_INCOME_LINE)) {
        console.warn(`⚠️ Ignoring the "${NET_INCOME_LINE}" operating entry; it is taken from the Profit & Loss`);
      }

      return this.aggregator.buildCashFlow({
        netIncome,
        // Seeded last so it always matches netIncome.
        operating: { ...params.cashFlow?.operating, [NET_INCOME_LINE]: netIncome },
        investing: params.cashFlow?.investing,
        financing: params.cashFlow?.financing,
        beginningCash: params.beginningCash,
      });
    });

    const report: ReportRun = {
      period: params.period ?? null,
      generatedAt: new Date().toISOString(),
      recordCounts: {
        invoices: invoices.status === 'fulfilled' ? invoices.value.length : null,
        bills: bills.status === 'fulfilled' ? bills.value.length : null,
        accounts: accounts.status === 'fulfilled' ? accounts.value.length : null,
      },
      profitAndLoss,
      balanceSheet,
      cashFlow,
    };

    this.logSummary(report);
    return report;
  }

  /**
   * Runs the report and, when the ledger rejects the credential, refreshes it once
   * and runs the whole report again.
   */
  async runWithCredentialRefresh(params: RunReportParams = {}): Promise<ReportRun> {
    try {
      return await this.run(params);
    } catch (error) {
      if (!(error instanceof AuthorizationError)) {
        throw error;
      }

      console.warn('⚠️ Access token is invalid or expired. Attempting to refresh...');
      await this.credentials.refresh();
      console.log('✅ Access token refreshed, rerunning report');

      return this.run(params);
    }
  }

  private unwrap(result: PromiseSettledResult<unknown[]>): unknown[] {
    if (result.status === 'rejected') {
      throw result.reason;
    }

    return result.value;
  }

  private buildStatement<T>(build: () => T): StatementOutcome<T> {
    try {
      return succeeded(build());
    } catch (error) {
      return failed(error);
    }
  }

  private logSummary(report: ReportRun): void {
    const outcomes = {
      profitAndLoss: report.profitAndLoss,
      balanceSheet: report.balanceSheet,
      cashFlow: report.cashFlow,
    };

    for (const [name, outcome] of Object.entries(outcomes)) {
      if (outcome.status === 'failed') {
        console.error(`❌ ${name} failed (${outcome.error.errorClass}): ${outcome.error.message}`);
      } else {
        console.log(`✅ ${name} built`);
      }
    }
  }
}
