import { loadConfig } from './config.js';
import type { LogLevel } from './config.js';

type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let threshold = LEVELS[loadConfig().logLevel];

export function setLogLevel(level: LogLevel) {
  threshold = LEVELS[level];
}

function asErrorPayload(error: unknown): object {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined ? { cause: asErrorPayload(error.cause) } : {}),
    };
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return { message: String(error) };
}

function normalizeMeta(meta?: LogMeta) {
  if (!meta) return undefined;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? asErrorPayload(value) : value;
  }
  return Object.keys(out).length ? out : undefined;
}

// stdout is reserved for canonical policies and diffs
function baseLog(level: LogLevel, message: string, meta?: LogMeta) {
  if (LEVELS[level] > threshold) return;
  const timestamp = new Date().toISOString();
  const normalized = normalizeMeta(meta);
  const line = normalized
    ? `${timestamp} [${level.toUpperCase()}] ${message} ${JSON.stringify(normalized)}`
    : `${timestamp} [${level.toUpperCase()}] ${message}`;

  console.error(line);
}

export const logger = {
  trace(message: string, meta?: LogMeta) {
    baseLog('trace', message, meta);
  },
  debug(message: string, meta?: LogMeta) {
    baseLog('debug', message, meta);
  },
  info(message: string, meta?: LogMeta) {
    baseLog('info', message, meta);
  },
  warn(message: string, meta?: LogMeta) {
    baseLog('warn', message, meta);
  },
  error(message: string, meta?: LogMeta) {
    baseLog('error', message, meta);
  },
};

export function serializeError(error: unknown) {
  return asErrorPayload(error);
}
