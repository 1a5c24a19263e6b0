export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

type ConsoleLike = Pick<Console, 'log' | 'info' | 'warn' | 'error' | 'debug'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console-backed logger that prefixes every message with `[scope]` and drops messages
 * below `level`.
 */
export function createLogger(
  scope: string,
  level: LogLevel = 'info',
  sink: ConsoleLike = console,
): Logger {
  const enabled = (messageLevel: LogLevel): boolean =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];
  const format = (message: string): string => `[${scope}] ${message}`;

  return {
    info: (message) => {
      if (enabled('info')) sink.info(format(message));
    },
    warn: (message) => {
      if (enabled('warn')) sink.warn(format(message));
    },
    error: (message) => {
      if (enabled('error')) sink.error(format(message));
    },
    debug: (message) => {
      if (enabled('debug')) sink.debug(format(message));
    },
  };
}

export function childLogger(logger: Logger, scope: string): Logger {
  const format = (message: string): string => `[${scope}] ${message}`;
  return {
    info: (message) => logger.info(format(message)),
    warn: (message) => logger.warn(format(message)),
    error: (message) => logger.error(format(message)),
    debug: (message) => logger.debug?.(format(message)),
  };
}
