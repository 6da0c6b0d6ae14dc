import { loadConfig } from '../config/Config.js';
import { InMemoryEntitySource } from '../adapters/ledger/InMemoryEntitySource.js';
import { QuickBooksEntitySource } from '../adapters/ledger/QuickBooksEntitySource.js';
import { AppContainer } from './AppContainer.js';

describe('AppContainer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('runs offline when ledger credentials are missing', () => {
    const container = new AppContainer({ config: loadConfig({ QBO_REALM_ID: '123' }) });

    expect(container.hasLiveLedger()).toBe(false);
    expect(container.sources.invoices).toBeInstanceOf(InMemoryEntitySource);
    expect(console.warn).toHaveBeenCalledWith(
      '⚠️ Ledger credentials not configured (QBO_CLIENT_ID, QBO_CLIENT_SECRET, QBO_ACCESS_TOKEN, QBO_REFRESH_TOKEN); running with empty offline data',
    );
  });

  test('wires the live ledger when fully configured', () => {
    const container = new AppContainer({
      config: loadConfig({
        QBO_CLIENT_ID: 'test-client',
        QBO_CLIENT_SECRET: 'test-secret',
        QBO_ACCESS_TOKEN: 'test-access-token',
        QBO_REFRESH_TOKEN: 'test-refresh-token',
        QBO_REALM_ID: '123',
      }),
      transport: jest.fn(),
    });

    expect(container.hasLiveLedger()).toBe(true);
    expect(container.sources.bills).toBeInstanceOf(QuickBooksEntitySource);
    expect(container.sources.bills.entity).toBe('Bill');
  });

  test('produces an empty report from offline data', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const container = new AppContainer({ config: loadConfig({}) });

    const report = await container.reportService.run();

    expect(report.recordCounts).toEqual({ invoices: 0, bills: 0, accounts: 0 });
    expect(report.cashFlow).toMatchObject({ status: 'succeeded', statement: { endingCash: 0 } });
  });
});
