import { config } from 'dotenv';
import { ConfigurationError } from './errors.js';

config();

export interface BenchConfig {
  serpApiKey?: string;
  serpBaseUrl: string;
  concurrency: number;
  ratePerSecond: number;
  connectTimeoutSec: number;
  readTimeoutSec: number;
  batchSize: number;
  monitorIntervalSec: number;
  outputDir: string;
  detailLogging: boolean;
  insecureTls: boolean;
  proxyTargetUrl: string;
  proxyHostTemplate?: string;
  proxyAuthTemplate?: string;
}

type Env = Record<string, string | undefined>;

export function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${raw}"`);
  }
}

function optional(raw: string | undefined): string | undefined {
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

export function loadConfig(env: Env = process.env): BenchConfig {
  return {
    serpApiKey: optional(env.SERP_API_KEY),
    serpBaseUrl: env.SERP_BASE_URL || 'https://serpapi.com/search.json',
    concurrency: parseNumber('BENCH_CONCURRENCY', env.BENCH_CONCURRENCY, 10),
    ratePerSecond: parseNumber('BENCH_RATE_PER_SEC', env.BENCH_RATE_PER_SEC, 0),
    connectTimeoutSec: parseNumber('BENCH_CONNECT_TIMEOUT', env.BENCH_CONNECT_TIMEOUT, 10),
    readTimeoutSec: parseNumber('BENCH_READ_TIMEOUT', env.BENCH_READ_TIMEOUT, 20),
    batchSize: parseNumber('BENCH_BATCH_SIZE', env.BENCH_BATCH_SIZE, 1000),
    monitorIntervalSec: parseNumber('BENCH_MONITOR_INTERVAL', env.BENCH_MONITOR_INTERVAL, 10),
    outputDir: env.BENCH_OUTPUT_DIR || process.cwd(),
    detailLogging: parseBoolean('BENCH_DETAIL_LOG', env.BENCH_DETAIL_LOG, true),
    insecureTls: parseBoolean('BENCH_INSECURE_TLS', env.BENCH_INSECURE_TLS, false),
    proxyTargetUrl: env.PROXY_TARGET_URL || 'https://ipinfo.io/json',
    proxyHostTemplate: optional(env.PROXY_HOST_TEMPLATE),
    proxyAuthTemplate: optional(env.PROXY_AUTH_TEMPLATE),
  };
}

export function requireSerpApiKey(cfg: BenchConfig): string {
  if (!cfg.serpApiKey) {
    throw new ConfigurationError('SERP_API_KEY environment variable is required');
  }
  return cfg.serpApiKey;
}
