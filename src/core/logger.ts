export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Message parts, or a function producing them so that filtered output costs nothing. */
export type LogMessage = unknown | (() => unknown);

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface Logger {
  readonly tag: string;
  level: LogLevel;
  debug(...messages: LogMessage[]): void;
  info(...messages: LogMessage[]): void;
  warn(...messages: LogMessage[]): void;
  error(...messages: LogMessage[]): void;
  /** Same sink and level, tag "parent:child". */
  child(tag: string): Logger;
}

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

function resolveMessages(messages: LogMessage[]): unknown[] {
  return messages.flatMap((msg) => {
    const resolved = typeof msg === 'function' ? msg() : msg;
    return Array.isArray(resolved) ? resolved : [resolved];
  });
}

/**
 * Console logger prefixing every line with `[tag]`.
 *
 * ```ts
 * const log = createLogger('referee', 'debug');
 * log.info('turn', 3, 'seat', 0);      // [referee] turn 3 seat 0
 * log.debug(() => board.toString());   // evaluated only at debug level
 * ```
 */
export function createLogger(tag: string, level: LogLevel = 'info', sink: LogSink = console): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, messages: LogMessage[]) => {
    if (RANK[at] < RANK[logger.level]) return;
    sink[at](`[${tag}]`, ...resolveMessages(messages));
  };
  const logger: Logger = {
    tag,
    level,
    debug: (...messages) => emit('debug', messages),
    info: (...messages) => emit('info', messages),
    warn: (...messages) => emit('warn', messages),
    error: (...messages) => emit('error', messages),
    child: (childTag) => createLogger(`${tag}:${childTag}`, logger.level, sink)
  };
  return logger;
}

/** Logger that drops everything; the default where none is passed. */
export const silentLogger: Logger = createLogger('silent', 'silent');
