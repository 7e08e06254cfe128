export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const satisfies readonly LogLevel[];

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives one JSON line per entry. Defaults to stdout. */
  write?: (line: string) => void;
}

/**
 * JSON-lines logger. Each entry carries the level, message, an ISO
 * timestamp, the bindings of every enclosing `child()` and the call's data.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const threshold = LEVEL_VALUES[options?.level ?? 'info'];
  const write = options?.write ?? ((line: string) => process.stdout.write(line + '\n'));
  return buildLogger(threshold, write, {});
}

function buildLogger(
  threshold: number,
  sink: (line: string) => void,
  bindings: Record<string, unknown>,
): Logger {
  function write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_VALUES[level] < threshold) return;

    const entry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      ...bindings,
      ...data,
    };

    sink(JSON.stringify(entry));
  }

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
    fatal: (msg, data) => write('fatal', msg, data),
    child: (childBindings) => buildLogger(threshold, sink, { ...bindings, ...childBindings }),
  };
}
