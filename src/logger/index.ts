import winston from 'winston';
import { config } from '../config/config';

// Request-scoped fields attached to every log line (omitted at bootstrap / background work)
export interface LogContext {
  requestId?: string;
  routeName?: string;
  deliveryId?: string;
}

export type LogMeta = Record<string, unknown>;

const REDACTED_KEYS = new Set(['secret', 'token', 'authorization', 'privatekey', 'githubtoken']);

const redactValue = (value: unknown, depth: number): unknown => {
  if (depth > 4 || value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[redacted]' : redactValue(inner, depth + 1);
  }
  return out;
};

// Masks credential-bearing keys anywhere in the metadata before it reaches a transport
export const redactMeta = (meta: LogMeta): LogMeta => {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[redacted]' : redactValue(value, 0);
  }
  return out;
};

// Base Winston logger (JSON structured, level from config; silent under jest)
const loggerInstance = winston.createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});

type Level = 'info' | 'error' | 'debug' | 'warn';

const write = (level: Level, ctx: LogContext | undefined, message: string, meta: LogMeta) => {
  const logMeta = redactMeta(meta);
  const requestId = ctx?.requestId;
  if (requestId && requestId !== 'unknown') {
    logMeta.requestId = requestId;
  }
  if (ctx?.routeName) {
    logMeta.routeName = ctx.routeName;
  }
  if (ctx?.deliveryId) {
    logMeta.deliveryId = ctx.deliveryId;
  }
  loggerInstance.log(level, message, logMeta);
};

// Public API: logger.info(ctx, msg, meta?) – ctx is usually the express request, {} at bootstrap
export const logger = {
  info: (ctx: LogContext | undefined, message: string, meta: LogMeta = {}) => write('info', ctx, message, meta),
  error: (ctx: LogContext | undefined, message: string, meta: LogMeta = {}) => write('error', ctx, message, meta),
  debug: (ctx: LogContext | undefined, message: string, meta: LogMeta = {}) => write('debug', ctx, message, meta),
  warn: (ctx: LogContext | undefined, message: string, meta: LogMeta = {}) => write('warn', ctx, message, meta),
};

export type Logger = typeof logger;
