import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Console output goes to stderr so command output on stdout stays parseable
 */

const SECRET_PATTERNS = [
  /api[_-]?key[=:]\s*["']?([^"'\s&]+)/gi,
  /[?&]key=([^"'\s&]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /(AIza[0-9A-Za-z_-]{20,})/g, // Google API keys
];

const SECRET_FIELDS = ['password', 'apiKey', 'api_key', 'token', 'secret', 'GEMINI_API_KEY'];

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Redacts sensitive information from log values
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) => {
        return match.replace(secret, '***REDACTED***');
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
      if (SECRET_FIELDS.includes(key)) {
        redacted[key] = '***REDACTED***';
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}

/**
 * Redacts every string-keyed field except the level
 */
const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = SECRET_FIELDS.includes(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Pick<Env, 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: env.LOG_LEVEL,
      stderrLevels: LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        level: 'debug',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_FILE ? 'debug' : env.LOG_LEVEL,
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (replaced by the CLI entry point once the environment is known)
 */
export let logger: winston.Logger = createLogger({ LOG_LEVEL: 'warn', LOG_FILE: undefined });

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
