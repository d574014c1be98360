export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ENV = 'URDF_MATE_TOOLS_LOG_LEVEL';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function createConsoleLogger(
  level: LogLevel = readLogLevel(),
  sink: Pick<Console, 'debug' | 'info' | 'warn' | 'error'> = console
): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  return {
    debug: (message) => {
      if (enabled('debug')) sink.debug(message);
    },
    info: (message) => {
      if (enabled('info')) sink.info(message);
    },
    warn: (message) => {
      if (enabled('warn')) sink.warn(message);
    },
    error: (message) => {
      if (enabled('error')) sink.error(message);
    }
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');

function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env[LOG_LEVEL_ENV]?.toLowerCase();
  return isLogLevel(value) ? value : 'info';
}
