import { ConfigurationError } from '../../domain/errors/LedgerReportError.js';

export type LedgerEnvironment = 'sandbox' | 'production';

export interface AppConfig {
  quickbooks: {
    clientId?: string;
    clientSecret?: string;
    accessToken?: string;
    refreshToken?: string;
    realmId?: string;
    environment: LedgerEnvironment;
    baseUrl?: string;
    minorVersion: string;
  };
  app: {
    port: number;
    beginningCash: number;
  };
}

const REQUIRED_LEDGER_SETTINGS = {
  QBO_CLIENT_ID: 'clientId',
  QBO_CLIENT_SECRET: 'clientSecret',
  QBO_ACCESS_TOKEN: 'accessToken',
  QBO_REFRESH_TOKEN: 'refreshToken',
  QBO_REALM_ID: 'realmId',
} as const;

const toEnvironment = (value: string | undefined): LedgerEnvironment =>
  value === 'production' ? 'production' : 'sandbox';

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined || value.trim() === '' ? Number.NaN : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    quickbooks: {
      clientId: env.QBO_CLIENT_ID || undefined,
      clientSecret: env.QBO_CLIENT_SECRET || undefined,
      accessToken: env.QBO_ACCESS_TOKEN || undefined,
      refreshToken: env.QBO_REFRESH_TOKEN || undefined,
      realmId: env.QBO_REALM_ID || undefined,
      environment: toEnvironment(env.QBO_ENVIRONMENT),
      baseUrl: env.QBO_BASE_URL || undefined,
      minorVersion: env.QBO_MINOR_VERSION ?? '75',
    },
    app: {
      port: toNumber(env.PORT, 4000),
      beginningCash: toNumber(env.REPORT_BEGINNING_CASH, 0),
    },
  };
};

export const missingLedgerSettings = (config: AppConfig): string[] =>
  Object.entries(REQUIRED_LEDGER_SETTINGS)
    .filter(([, key]) => !config.quickbooks[key])
    .map(([envName]) => envName);

export interface LedgerSettings {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
  realmId: string;
  environment: LedgerEnvironment;
  baseUrl?: string;
  minorVersion: string;
}

export const requireLedgerSettings = (config: AppConfig): LedgerSettings => {
  const { clientId, clientSecret, accessToken, refreshToken, realmId } = config.quickbooks;

  if (!clientId || !clientSecret || !accessToken || !refreshToken || !realmId) {
    throw new ConfigurationError(missingLedgerSettings(config));
  }

  return { ...config.quickbooks, clientId, clientSecret, accessToken, refreshToken, realmId };
};
