import pino from 'pino';
import { CONFIG } from './config';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// stdout carries the report, so logs go to stderr. Sync writes keep
// lines ordered with the report and flushed before process exit.
const logger = pino(
  {
    name: 'ns-delegation-check',
    level: isLogLevel(CONFIG.LOG_LEVEL) ? CONFIG.LOG_LEVEL : 'warn',
  },
  pino.destination({ dest: 2, sync: true }),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export default logger;
