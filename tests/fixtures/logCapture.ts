import type { Logger } from 'pino';
import { createLogger } from '../../src/logging/logger.js';
import type { LogLevel } from '../../src/types/config.types.js';

export type LogLine = Record<string, unknown>;

export function captureLogs(level: LogLevel = 'info'): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      const line: LogLine = JSON.parse(msg);
      lines.push(line);
    },
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return createLogger('silent');
}
