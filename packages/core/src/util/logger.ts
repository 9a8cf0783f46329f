/**
 * Process-wide logger. Writes to stderr so that stdout stays reserved for
 * command output (including `--json` payloads).
 */

import winston from 'winston';
import type { LogLevel } from '../config/config.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function formatMeta(meta: Record<string, unknown>): string {
  const keys = Object.keys(meta);
  if (keys.length === 0) return '';
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return ` [meta not serializable: ${msg}]`;
  }
}

export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      return `${String(timestamp)} ${level.toUpperCase()} ${String(message)}${formatMeta(meta)}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
