/**
 * @parley-module: Logger
 * @parley-risk: low
 * @parley-scope: utility
 *
 * @description
 * Winston-based logging utility with console and file transports. Provides structured logging for every bot operation.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break core functionality.
 * Privacy: Logs may contain user content, so raw Discord identifiers are scrubbed before any transport sees them.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
// Discord snowflakes are 17-19 digit numeric strings.
const DISCORD_ID_REGEX = /\b\d{17,19}\b/g;

/**
 * Recursively sanitize log data to strip raw Discord identifiers. Stores
 * pseudonymize identifiers on their own; this layer only catches what slips through.
 */
export function sanitizeLogData(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(DISCORD_ID_REGEX, '[REDACTED_ID]');
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry));
  }

  if (value instanceof Error) {
    // Errors keep their prototype so winston can still print the stack.
    value.message = String(sanitizeLogData(value.message));
    return value;
  }

  if (value && typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(val);
    }
    return sanitized;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  // Extra args passed to logger.info/debug/etc.
  const splat = info[splatSymbol];
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item: unknown) => sanitizeLogData(item));
  }

  return info;
});

/**
 * Console line format: timestamp, level, optional module tag and message.
 */
const logFormat = printf(({ level, message, timestamp, module }) => {
  const tag = typeof module === 'string' ? ` (${module})` : '';
  return `${timestamp} [${level}]${tag}: ${String(message)}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || 'debug').toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console({ silent: process.env.LOG_SILENT === 'true' }),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

/**
 * Returns a child logger tagged with the calling module's name.
 */
export const createModuleLogger = (module: string) => logger.child({ module });
