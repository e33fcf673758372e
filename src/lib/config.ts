import type { LogLevel } from './log';

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function logLevelFromEnv(): LogLevel {
  const value = (process.env.FEEDTERM_LOG_LEVEL || '').toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return 'info';
}

export const config = {
  get postgresUrl() { return process.env.POSTGRES_URL || ''; },
  get jinaApiKey() { return process.env.JINA_API_KEY || ''; },
  get jinaBaseUrl() { return process.env.JINA_BASE_URL || 'https://r.jina.ai'; },
  get refreshIntervalMinutes() { return intFromEnv('REFRESH_INTERVAL_MINUTES', 0); },
  get markReadOnOpen() { return (process.env.MARK_READ_ON_OPEN || 'true').toLowerCase() !== 'false'; },
  get logFile() { return process.env.FEEDTERM_LOG_FILE || ''; },
  get logLevel() { return logLevelFromEnv(); },
  maxConcurrentFetches: 10,
  feedTimeoutMs: 30_000,
  extractTimeoutMs: 20_000,
  discoveryTimeoutMs: 10_000,
  maxDiscoveryBytes: 5 * 1024 * 1024,
  maxFeedBytes: 10 * 1024 * 1024,
  maxContentBytes: 5 * 1024 * 1024,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  circuitBreakerThreshold: 5,
  tickMs: 250,
  statusTtlMs: 3000,
  // How long exit waits for in-flight writes such as the last reading session
  shutdownGraceMs: 2000,
  searchDebounceMs: 300,
  maxSearchLength: 256,
  userAgent: 'feedterm/0.1 (+terminal feed reader)',
};

