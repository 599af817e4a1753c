import dotenv from 'dotenv';

dotenv.config();

export const APP_CONFIG = Symbol('APP_CONFIG');

export type QuoteSource = 'yahoo' | 'none';
export type FxSource = 'frankfurter' | 'none';

export interface AppConfig {
  port: number;
  reportingCurrency: string;
  portfolioFile: string;
  quoteSource: QuoteSource;
  fxSource: FxSource;
  fxBaseUrl: string;
  lookupTimeoutMs: number;
  continueOnLedgerError: boolean;
}

function getEnvVar(name: string, defaultValue: string): string {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : defaultValue;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid number for ${name}: ${value}`);
  }
  return parsed;
}

function getEnvBoolean(name: string, defaultValue: boolean): boolean {
  const value = process.env[name]?.toLowerCase();
  if (!value) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function getEnvChoice<T extends string>(name: string, choices: readonly T[], defaultValue: T): T {
  const value = getEnvVar(name, defaultValue).toLowerCase();
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`Invalid value for ${name}: ${value} (expected one of ${choices.join(', ')})`);
  }
  return match;
}

export function loadConfig(): AppConfig {
  return {
    port: getEnvNumber('PORT', 3000),
    reportingCurrency: getEnvVar('REPORTING_CURRENCY', 'USD').toUpperCase(),
    portfolioFile: getEnvVar('PORTFOLIO_FILE', 'data/portfolio.json'),
    quoteSource: getEnvChoice<QuoteSource>('QUOTE_SOURCE', ['yahoo', 'none'], 'yahoo'),
    fxSource: getEnvChoice<FxSource>('FX_SOURCE', ['frankfurter', 'none'], 'frankfurter'),
    fxBaseUrl: getEnvVar('FX_BASE_URL', 'https://api.frankfurter.app'),
    lookupTimeoutMs: getEnvNumber('LOOKUP_TIMEOUT_MS', 5000),
    continueOnLedgerError: getEnvBoolean('CONTINUE_ON_LEDGER_ERROR', false),
  };
}
