import type { LogContext, LogLevel, Logger } from '../types/logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Where log lines are written. Defaults to `console`.
 */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

type LoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

/**
 * Create a console-backed logger.
 *
 * Lines look like `[chatcache:orchestrator] cache miss`, followed by the
 * context object when one is given. Entries below `level` are dropped.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? console;
  const threshold = LEVEL_ORDER[level];

  const write =
    (entryLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, context?: LogContext): void => {
      if (LEVEL_ORDER[entryLevel] < threshold) return;
      const line = `[${scope}] ${message}`;
      if (context === undefined) sink[entryLevel](line);
      else sink[entryLevel](line, context);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (child) => createLogger(`${scope}:${child}`, { level, sink }),
  };
}

/**
 * Logger that drops everything. Used where no logger was injected.
 */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

/**
 * Shorten free text (queries, model output) before it goes into a log line.
 */
export function truncateForLog(text: string, max = 80): string {
  return text.length <= max ? text : `${text.slice(0, max)}…`;
}

/**
 * Reduce an unknown thrown value to something safe to log.
 */
export function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    const context: LogContext = { error: error.name, message: error.message };
    if (error.cause instanceof Error) context.cause = `${error.cause.name}: ${error.cause.message}`;
    return context;
  }
  return { error: String(error) };
}
