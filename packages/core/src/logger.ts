import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name: string;
  level?: LevelWithSilent;
  base?: Record<string, unknown>;
}

/**
 * Structured JSON logger. Severity is written as an upper-case label and
 * pid/hostname bindings are dropped.
 */
export function createLogger(options: LoggerOptions): Logger {
  const { name, level = 'info', base = {} } = options;
  return pino({
    name,
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      bindings: () => ({}),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: name, ...base },
  });
}

/** Logger that drops everything. */
export function silentLogger(): Logger {
  return createLogger({ name: 'crowdsim', level: 'silent' });
}
