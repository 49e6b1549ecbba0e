import winston from 'winston';
import type { AppConfig } from './env.js';

/**
 * Console logger with secret redaction.
 * The console shows the colourised message only; the optional log file gets JSON lines.
 */

const REDACTED = '***REDACTED***';

const SECRET_KEYS = ['password', 'apiKey', 'apiToken', 'token', 'secret', 'authorization'];

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?token[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /Authorization:\s*Basic\s+([A-Za-z0-9+/=]+)/gi,
];

/**
 * Redacts sensitive information from log messages and metadata
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) => {
        return match.replace(secret, REDACTED);
      });
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Error) {
    return obj;
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_KEYS.includes(key) ? REDACTED : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = SECRET_KEYS.includes(key) ? REDACTED : redactSecrets(info[key]);
  }
  return info;
})();

export type LoggerOptions = Pick<AppConfig, 'logLevel' | 'logFile'>;

/**
 * Creates a Winston logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.printf(({ level: _level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (options.logFile) {
    transports.push(
      new winston.transports.File({
        filename: options.logFile,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: options.logLevel,
    format: winston.format.combine(redactFormat, winston.format.errors({ stack: true })),
    transports,
    exitOnError: false,
  });
}

/**
 * Process-wide logger (installed by the CLI); silent until then
 */
export let logger: winston.Logger = winston.createLogger({ silent: true });

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
