import pino, {
  type DestinationStream,
  type LoggerOptions,
  type Logger as PinoLogger,
} from 'pino';

import { getTraceContext } from './otel-correlation.js';
import { redactContext, type RedactionMode } from './redaction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Logger = Readonly<{
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
  fatal: (context: Record<string, unknown>, message: string) => void;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Append JSON lines to this file instead of stdout. */
  logFile?: string;
  /** Explicit sink, mainly for tests. Takes precedence over logFile. */
  destination?: DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = createPinoLogger(options);
  return createLoggerWrapper(pinoLogger, options.env, {});
}

function resolveDestination(options: CreateLoggerOptions): DestinationStream | undefined {
  if (options.destination) return options.destination;
  if (options.logFile) {
    return pino.destination({ dest: options.logFile, mkdir: true, sync: true });
  }
  return undefined;
}

function createPinoLogger(options: CreateLoggerOptions): PinoLogger {
  const pinoOptions: LoggerOptions = {
    level: options.level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service: options.service,
      env: options.env,
      version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  const destination = resolveDestination(options);
  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

function createLoggerWrapper(
  pinoLogger: PinoLogger,
  mode: RedactionMode,
  baseContext: Record<string, unknown>
): Logger {
  const log = (level: LogLevel, context: Record<string, unknown>, message: string): void => {
    const trace = getTraceContext();
    const merged: Record<string, unknown> = { ...baseContext, ...context };
    if (trace.traceId) {
      merged['trace_id'] = trace.traceId;
      merged['span_id'] = trace.spanId;
    }

    const redacted = redactContext(toSnakeCaseRecord(merged), mode);

    pinoLogger[level](redacted, message);
  };

  return {
    debug: (context, message) => log('debug', context, message),
    info: (context, message) => log('info', context, message),
    warn: (context, message) => log('warn', context, message),
    error: (context, message) => log('error', context, message),
    fatal: (context, message) => log('fatal', context, message),
    child: (ctx) => createLoggerWrapper(pinoLogger, mode, { ...baseContext, ...ctx }),
  };
}

function toSnakeCaseRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  if (value instanceof Error) return value;
  if (typeof value !== 'object') return value;

  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

export function toSnakeKey(key: string): string {
  // Preserve existing snake_case.
  if (key.includes('_')) return key.toLowerCase();

  const withUnderscore = key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2');
  return withUnderscore.toLowerCase();
}
