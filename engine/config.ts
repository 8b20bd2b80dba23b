// engine/config.ts
// Canonical config for the AP site import engine.

import { ConfigError } from './errors';
import type { OutputFormat } from './types';

export interface InventoryServiceConfig {
  apiToken: string;
  orgId: string;
  baseUrl: string;          // no trailing slash
  requestTimeoutMs: number;
}

export interface InputConfig {
  sheetName: string | null; // null → first worksheet
}

export interface ExecutionConfig {
  assignConcurrency: number; // 1 = strictly sequential
}

export interface ResultsConfig {
  prefix: string;           // blob pathname prefix, e.g. "ap-results/"
  format: OutputFormat;
  retentionMs: number;      // cleanup cron deletes artifacts older than this
}

export interface AppConfig {
  inventory: InventoryServiceConfig;
  input: InputConfig;
  execution: ExecutionConfig;
  results: ResultsConfig;
}

export const MAX_ASSIGN_CONCURRENCY = 16;

// Defaults for everything except credentials.
export const DEFAULT_APP_CONFIG: Omit<AppConfig, 'inventory'> & {
  inventory: Pick<InventoryServiceConfig, 'requestTimeoutMs'>;
} = {
  inventory: {
    requestTimeoutMs: 30_000
  },
  input: {
    sheetName: null
  },
  execution: {
    assignConcurrency: 1
  },
  results: {
    prefix: 'ap-results/',
    format: 'csv',
    retentionMs: 2 * 60 * 60 * 1000
  }
};

type Env = Record<string, string | undefined>;

function readRequired(env: Env, key: string): string {
  const value = (env[key] ?? '').trim();
  if (!value) {
    throw new ConfigError(`Missing required configuration: ${key}`);
  }
  return value;
}

function readOptional(env: Env, key: string): string | null {
  const value = (env[key] ?? '').trim();
  return value === '' ? null : value;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readOptional(env, key);
  if (raw === null) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function readFormat(env: Env, key: string, fallback: OutputFormat): OutputFormat {
  const raw = (readOptional(env, key) ?? '').toLowerCase();
  if (raw === 'csv' || raw === 'xlsx') return raw;
  return fallback;
}

/**
 * Build the runtime config from environment variables.
 * Throws ConfigError (E601) when a credential is missing.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const concurrency = readPositiveInt(
    env,
    'ASSIGN_CONCURRENCY',
    DEFAULT_APP_CONFIG.execution.assignConcurrency
  );

  return {
    inventory: {
      apiToken: readRequired(env, 'INVENTORY_API_TOKEN'),
      orgId: readRequired(env, 'INVENTORY_ORG_ID'),
      baseUrl: readRequired(env, 'INVENTORY_BASE_URL').replace(/\/+$/, ''),
      requestTimeoutMs: readPositiveInt(
        env,
        'REQUEST_TIMEOUT_MS',
        DEFAULT_APP_CONFIG.inventory.requestTimeoutMs
      )
    },
    input: {
      sheetName: readOptional(env, 'INVENTORY_SHEET_NAME')
    },
    execution: {
      assignConcurrency: Math.min(concurrency, MAX_ASSIGN_CONCURRENCY)
    },
    results: {
      prefix: readOptional(env, 'RESULTS_PREFIX') ?? DEFAULT_APP_CONFIG.results.prefix,
      format: readFormat(env, 'RESULTS_FORMAT', DEFAULT_APP_CONFIG.results.format),
      retentionMs: DEFAULT_APP_CONFIG.results.retentionMs
    }
  };
}
