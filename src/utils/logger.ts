import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logsDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');

// Jest sets NODE_ENV=test; tests stay quiet unless SHOW_LOGS is set
const silent = process.env.NODE_ENV === 'test' && !process.env.SHOW_LOGS;

if (!silent) {
  try {
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
  } catch (error) {
    // If we can't create logs dir, just use console
    console.error('Failed to create logs directory:', error);
  }
}

const logLevel = process.env.LOG_LEVEL || 'info';

const EMAIL_PATTERN = /([a-zA-Z0-9_\-.]+)@([a-zA-Z0-9_\-.]+)\.([a-zA-Z]{2,24})/g;
const SECRET_KEYS = new Set(['password', 'secret', 'pass', 'MAIL_PASSWORD', 'NAS_PASSWORD']);

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(EMAIL_PATTERN, '[REDACTED_EMAIL]');
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SECRET_KEYS.has(key) ? '[REDACTED]' : redactValue(entry);
    }
    return redacted;
  }
  return value;
}

/**
 * Masks e-mail addresses and credential fields in every log entry
 */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SECRET_KEYS.has(key) ? '[REDACTED]' : redactValue(info[key]);
  }
  return info;
});

const transports: winston.transport[] = [];

if (!silent) {
  try {
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error'
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log')
      })
    );
  } catch (error) {
    console.error('Failed to create file transports:', error);
  }
}

// stdout carries JSON-RPC, so console output always goes to stderr
if (process.env.NODE_ENV !== 'production') {
  transports.push(
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  silent,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    redactSecrets(),
    winston.format.json()
  ),
  defaultMeta: { service: 'mail-archive-mcp-server' },
  transports,
  exitOnError: false
});

/**
 * Child logger tagged with the engine or component name
 */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
