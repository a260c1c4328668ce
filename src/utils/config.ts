import { config as dotenvConfig } from 'dotenv';
import { HarvestConfig } from '../types/index.js';
import { ConfigError } from './errors.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

function getEnvVar(env: Env, key: string, required = true): string {
  const value = env[key]?.trim();
  if (required && !value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getIntVar(env: Env, key: string, fallback: number): number {
  const raw = getEnvVar(env, key, false);
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function getBoolVar(env: Env, key: string, fallback: boolean): boolean {
  const raw = getEnvVar(env, key, false).toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${raw}"`);
}

function getListVar(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build the harvester configuration from environment variables.
 * Throws ConfigError when a required variable is missing or malformed.
 */
export function loadConfig(env: Env = process.env): HarvestConfig {
  const baseUrl = getEnvVar(env, 'HARVEST_BASE_URL');
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`HARVEST_BASE_URL is not a valid URL: ${baseUrl}`);
  }

  const minMs = getIntVar(env, 'HARVEST_DELAY_MIN_MS', 800);
  const maxMs = getIntVar(env, 'HARVEST_DELAY_MAX_MS', 1600);
  if (maxMs < minMs) {
    throw new ConfigError(
      `HARVEST_DELAY_MAX_MS (${maxMs}) must not be lower than HARVEST_DELAY_MIN_MS (${minMs})`
    );
  }

  const maxPages = getIntVar(env, 'HARVEST_MAX_PAGES', 500);
  if (maxPages === 0) {
    throw new ConfigError('HARVEST_MAX_PAGES must be at least 1');
  }

  return {
    source: {
      baseUrl: baseUrl.replace(/\/+$/, ''),
      entityListPath: getEnvVar(env, 'HARVEST_ENTITY_LIST_PATH', false) || '/users/collection_actors',
      userAgent: getEnvVar(env, 'HARVEST_USER_AGENT', false) || DEFAULT_USER_AGENT,
      requestTimeoutMs: getIntVar(env, 'HARVEST_REQUEST_TIMEOUT_MS', 30000),
    },
    crawl: {
      delay: { minMs, maxMs },
      earlyStop: getBoolVar(env, 'HARVEST_EARLY_STOP', true),
      maxPages,
    },
    credentials: {
      cookieFile: getEnvVar(env, 'HARVEST_COOKIE_FILE', false) || 'cookie.json',
      requiredCookies: getListVar(env, 'HARVEST_REQUIRED_COOKIES', []),
      recommendedCookies: getListVar(env, 'HARVEST_RECOMMENDED_COOKIES', [
        'over18',
        'cf_clearance',
        '_jdb_session',
      ]),
    },
    storage: {
      dbPath: getEnvVar(env, 'HARVEST_DB_PATH', false) || 'userdata/catalog.db',
      checkpointFile: getEnvVar(env, 'HARVEST_CHECKPOINT_FILE', false) || 'userdata/checkpoints.json',
      historyFile: getEnvVar(env, 'HARVEST_HISTORY_FILE', false) || 'userdata/history.jsonl',
      picksDir: getEnvVar(env, 'HARVEST_PICKS_DIR', false) || 'userdata/picks',
    },
    app: {
      logLevel: getEnvVar(env, 'LOG_LEVEL', false) || 'info',
      logDir: getEnvVar(env, 'LOG_DIR', false) || 'logs',
      sentryDsn: getEnvVar(env, 'SENTRY_DSN', false),
      sentryEnvironment: getEnvVar(env, 'SENTRY_ENVIRONMENT', false) || 'development',
    },
  };
}
