import { appendFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY_PATTERN = /(api[-_]?key|token|authorization|secret|password|credential)/i;
const QUERY_SECRET_PATTERN = /([?&](?:api[-_]?key|token|access_token|auth|password|secret)=)[^&\s]*/gi;
const BEARER_PATTERN = /\b(Bearer)\s+([A-Za-z0-9._\-+/=]+)/gi;
const CREDENTIAL_URL_PATTERN = /(postgres(?:ql)?:\/\/[^:\s/@]+:)[^@\s]+@/gi;

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export const silentSink: LogSink = () => {};

export function fileSink(path: string): LogSink {
  return (_level, line) => {
    appendFileSync(path, `${line}\n`);
  };
}

let sink: LogSink = consoleSink;
let minLevel: LogLevel = 'info';

export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level) minLevel = options.level;
  if (options.sink) sink = options.sink;
}

export function redact(value: string): string {
  return value
    .replace(CREDENTIAL_URL_PATTERN, '$1[REDACTED]@')
    .replace(QUERY_SECRET_PATTERN, '$1[REDACTED]')
    .replace(BEARER_PATTERN, '$1 [REDACTED]');
}

function contextReplacer(key: string, value: unknown): unknown {
  if (key && SENSITIVE_KEY_PATTERN.test(key)) return '[REDACTED]';
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

export function formatLine(level: LogLevel, scope: string, message: string, context?: Record<string, unknown>): string {
  const suffix = context ? ` ${JSON.stringify(context, contextReplacer)}` : '';
  return redact(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${suffix}`);
}

function write(level: LogLevel, scope: string, message: string, context?: Record<string, unknown>) {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[minLevel]) return;
  sink(level, formatLine(level, scope, message, context));
}

export const log = {
  debug: (scope: string, message: string, context?: Record<string, unknown>) => write('debug', scope, message, context),
  info: (scope: string, message: string, context?: Record<string, unknown>) => write('info', scope, message, context),
  warn: (scope: string, message: string, context?: Record<string, unknown>) => write('warn', scope, message, context),
  error: (scope: string, message: string, context?: Record<string, unknown>) => write('error', scope, message, context),
};
