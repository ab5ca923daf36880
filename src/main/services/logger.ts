/**
 * Tagged logger: every record carries the name of the service that wrote it.
 *
 * Records go to a single process-wide sink. The default sink prints one
 * console line per record: `<ISO time> <LEVEL> [<tag>] <message>`, with
 * ClipTrailErrors in the arguments shortened to `<code>: <message>`.
 * A host that embeds the core can swap the sink with `setLogSink`.
 *
 * Usage:
 *   const log = createLogger('ClipboardPoller');
 *   log.info('Monitoring started');
 *   log.warn('Read failed, backing off', { backoffMs: 1000 });
 *   log.error('Insert failed', err);
 */

import { ClipTrailError } from '../../shared/types/errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LogRecord {
  time: string;
  level: LogLevel;
  tag: string;
  message: string;
  args: unknown[];
}

export type LogSink = (record: LogRecord) => void;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Render a ClipTrailError as one readable token; other values pass through. */
export function formatLogArg(arg: unknown): unknown {
  if (!ClipTrailError.isClipTrailError(arg)) return arg;
  const cause = arg.originalError && arg.originalError.message !== arg.message
    ? ` (caused by: ${arg.originalError.message})`
    : '';
  return `${arg.code}: ${arg.message}${cause}`;
}

export function formatLogLine(record: LogRecord): string {
  return `${record.time} ${record.level.toUpperCase().padEnd(5)} [${record.tag}] ${record.message}`;
}

export const consoleSink: LogSink = (record) => {
  const line = formatLogLine(record);
  const args = record.args.map(formatLogArg);
  switch (record.level) {
    case 'debug':
      console.debug(line, ...args);
      break;
    case 'info':
      console.log(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'error':
      console.error(line, ...args);
      break;
  }
};

let globalLogLevel: LogLevel = 'info';
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Route every logger to `next`; `null` goes back to the console. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'HistoryStore', 'Config')
 */
export function createLogger(tag: string): Logger {
  // Level and sink are looked up per call, so runtime changes reach existing loggers
  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[globalLogLevel]) return;
    sink({ time: new Date().toISOString(), level, tag, message, args });
  };

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
  };
}
