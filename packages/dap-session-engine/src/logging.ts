import pino from 'pino';

/**
 * Interface for a structured logger.
 * Every component takes one through its constructor so callers can route
 * session logs into their own sink.
 */
export interface LoggerInterface {
  trace(message: string, ...args: unknown[]): void;
  trace(obj: object, message?: string, ...args: unknown[]): void;

  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Logs a message at the 'fatal' level (often implies process exit).
   */
  fatal?(message: string, ...args: unknown[]): void;
  fatal?(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Creates a child logger with additional bound context.
   * @param bindings Properties bound to every line the child writes.
   */
  child?(bindings: Record<string, unknown>): LoggerInterface;
}

export interface CreateLoggerOptions {
  level?: pino.LevelWithSilent;
  name?: string;
}

type LogMethod = (first: string | object, ...rest: unknown[]) => void;

const LOG_LEVEL_ENV = 'DAP_SESSION_LOG_LEVEL';
const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function toLogMethod(base: pino.Logger, level: pino.Level): LogMethod {
  return (first, ...rest) => {
    if (typeof first === 'string') {
      if (rest.length > 0) {
        base[level]({ args: rest }, first);
      } else {
        base[level](first);
      }
      return;
    }

    const [message, ...args] = rest;
    const bindings = args.length > 0 ? { ...first, args } : first;
    if (typeof message === 'string') {
      base[level](bindings, message);
    } else {
      base[level](bindings);
    }
  };
}

function wrap(base: pino.Logger): LoggerInterface {
  return {
    trace: toLogMethod(base, 'trace'),
    debug: toLogMethod(base, 'debug'),
    info: toLogMethod(base, 'info'),
    warn: toLogMethod(base, 'warn'),
    error: toLogMethod(base, 'error'),
    fatal: toLogMethod(base, 'fatal'),
    child: (bindings) => wrap(base.child(bindings)),
  };
}

function resolveLevel(requested?: pino.LevelWithSilent): pino.LevelWithSilent {
  if (requested) return requested;
  const fromEnv = process.env[LOG_LEVEL_ENV];
  return LEVELS.find((level) => level === fromEnv) ?? 'silent';
}

/**
 * Creates the default pino-backed logger. Logging is silent unless a level is
 * given or `DAP_SESSION_LOG_LEVEL` names one.
 */
export function createLogger(options: CreateLoggerOptions = {}): LoggerInterface {
  return wrap(
    pino({
      name: options.name ?? 'dap-session-engine',
      level: resolveLevel(options.level),
    }),
  );
}

export function childLogger(
  logger: LoggerInterface,
  bindings: Record<string, unknown>,
): LoggerInterface {
  return logger.child ? logger.child(bindings) : logger;
}
