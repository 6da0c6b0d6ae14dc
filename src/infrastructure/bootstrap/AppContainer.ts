import { LedgerRecordMapper } from '../../application/services/LedgerRecordMapper.js';
import { PagedFetcher } from '../../application/services/PagedFetcher.js';
import { LedgerSources, ReportService } from '../../application/services/ReportService.js';
import { StatementAggregator } from '../../application/services/StatementAggregator.js';
import { CategorizerPort } from '../../application/ports/CategorizerPort.js';
import { CredentialProviderPort } from '../../application/ports/CredentialProviderPort.js';
import { StatementRendererPort } from '../../application/ports/StatementRendererPort.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { OAuthCredentialProvider } from '../adapters/credentials/OAuthCredentialProvider.js';
import { StaticCredentialProvider } from '../adapters/credentials/StaticCredentialProvider.js';
import { InMemoryEntitySource } from '../adapters/ledger/InMemoryEntitySource.js';
import { QuickBooksEntitySource } from '../adapters/ledger/QuickBooksEntitySource.js';
import { ConsoleStatementRenderer } from '../adapters/renderer/ConsoleStatementRenderer.js';
import { AppConfig, loadConfig, missingLedgerSettings, requireLedgerSettings } from '../config/Config.js';
import { fetchTransport, Transport } from '../http/FetchTransport.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  transport?: Transport;
  sources?: LedgerSources;
  credentials?: CredentialProviderPort;
  categorizer?: CategorizerPort;
  fetcher?: PagedFetcher;
  renderer?: StatementRendererPort;
}

export class AppContainer {
  readonly config: AppConfig;
  private readonly ledgerLive: boolean;

  readonly credentials: CredentialProviderPort;
  readonly sources: LedgerSources;
  readonly categorizer: CategorizerPort;
  readonly fetcher: PagedFetcher;
  readonly mapper: LedgerRecordMapper;
  readonly aggregator: StatementAggregator;
  readonly reportService: ReportService;
  readonly renderer: StatementRendererPort;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const transport = overrides.transport ?? fetchTransport;

    if (overrides.sources) {
      this.sources = overrides.sources;
      this.credentials = overrides.credentials ?? new StaticCredentialProvider('offline');
      this.ledgerLive = false;
    } else if (missingLedgerSettings(this.config).length === 0) {
      const settings = requireLedgerSettings(this.config);
      const credentials = overrides.credentials ?? new OAuthCredentialProvider(settings, transport);
      const sourceConfig = {
        realmId: settings.realmId,
        environment: settings.environment,
        baseUrl: settings.baseUrl,
        minorVersion: settings.minorVersion,
      };

      this.credentials = credentials;
      this.sources = {
        invoices: new QuickBooksEntitySource('Invoice', sourceConfig, credentials, transport),
        bills: new QuickBooksEntitySource('Bill', sourceConfig, credentials, transport),
        accounts: new QuickBooksEntitySource('Account', sourceConfig, credentials, transport),
      };
      this.ledgerLive = true;
    } else {
      console.warn(
        `⚠️ Ledger credentials not configured (${missingLedgerSettings(this.config).join(', ')}); running with empty offline data`,
      );
      this.credentials = overrides.credentials ?? new StaticCredentialProvider('offline');
      this.sources = {
        invoices: new InMemoryEntitySource('Invoice'),
        bills: new InMemoryEntitySource('Bill'),
        accounts: new InMemoryEntitySource('Account'),
      };
      this.ledgerLive = false;
    }

    this.categorizer = overrides.categorizer ?? new RuleBasedCategorizer();
    this.fetcher = overrides.fetcher ?? new PagedFetcher();
    this.mapper = new LedgerRecordMapper();
    this.aggregator = new StatementAggregator(this.categorizer);
    this.renderer = overrides.renderer ?? new ConsoleStatementRenderer();
    this.reportService = new ReportService(this.sources, this.fetcher, this.mapper, this.aggregator, this.credentials);
  }

  hasLiveLedger(): boolean {
    return this.ledgerLive;
  }
}
