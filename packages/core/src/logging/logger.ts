/**
 * pino-based logging. Output goes to stderr as JSON lines so the CLI's
 * stdout stays clean.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Resolve a level from LOG_LEVEL, falling back to 'warn' */
export function levelFromEnv(value: string | undefined = process.env['LOG_LEVEL']): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find(l => l === normalized) ?? 'warn';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'eisen',
      level: options.level ?? levelFromEnv(),
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2),
  );
}

let rootLogger: Logger | null = null;

/** Lazily created process logger; modules take a child of it */
export function getLogger(component?: string): Logger {
  rootLogger ??= createLogger();
  return component ? rootLogger.child({ component }) : rootLogger;
}
