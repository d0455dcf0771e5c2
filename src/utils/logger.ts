/*
 * Structured JSON logger with request correlation and credential redaction.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  requestId?: string;
  userId?: string;
  syncId?: string;
  [key: string]: unknown;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in levelPriority;

const envLevel = process.env.LOG_LEVEL;
const threshold = isLogLevel(envLevel) ? levelPriority[envLevel] : levelPriority.info;

// Keys whose values must never reach the log stream
const SECRET_KEY_PATTERN = /(secret|password|token|api[_-]?key|credential|authorization)/i;

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Replace values of credential-like keys with a marker. Recurses into plain
 * objects and arrays; everything else is passed through untouched.
 */
export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 5 || value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1));
  }

  return redactRecord(value, depth);
};

const redactRecord = (value: object, depth = 0): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : redact(inner, depth + 1);
  }
  return out;
};

/**
 * Strip the userinfo from a connection URL so a password in it is never logged.
 */
export const redactUrl = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return '[unparseable url]';
  }
  url.username = '';
  url.password = '';
  return url.toString();
};

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const context = asyncLocalStorage.getStore() || {};

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
    ...(meta ? redactRecord(meta) : {})
  };

  console.log(JSON.stringify(payload));
};

export const getRequestContext = (): LogContext => {
  return asyncLocalStorage.getStore() || {};
};

/**
 * Run function with an extended context (used per sync run)
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run({ ...getRequestContext(), ...context }, fn);
};

export const generateRequestId = (): string => {
  return randomUUID();
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta)
};
