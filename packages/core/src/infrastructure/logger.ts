import { pino, type Logger, type LevelWithSilent, type DestinationStream } from 'pino';

export interface LoggerOptions {
  /** Minimum level. Default: `KEEXPORT_LOG_LEVEL`, else `'info'`. */
  readonly level?: LevelWithSilent;
  /** Where log lines are written. Default: stdout. */
  readonly destination?: DestinationStream;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFromEnv(): LevelWithSilent | undefined {
  const value = process.env['KEEXPORT_LOG_LEVEL'];
  return LEVELS.find((level) => level === value);
}

/** Build a JSON logger with the level rendered as its label. */
export function createLogger(options?: LoggerOptions): Logger {
  const config = {
    level: options?.level ?? levelFromEnv() ?? 'info',
    base: { name: 'keexport' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options?.destination ? pino(config, options.destination) : pino(config);
}

/** Logger used when the caller does not inject one. */
export const defaultLogger: Logger = createLogger();
