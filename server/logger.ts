import pino from 'pino';
import { resolveLogLevel } from './config.js';

const logger: pino.Logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { app: 'etf-holdings' },
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const TAG_PATTERN = /^\[([a-z0-9_-]+)\]\s*/i;

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/**
 * Services log with `console.*` and a `[tag]` prefix (`[merge]`, `[fetch]`).
 * The prefix becomes a `tag` field on the pino record.
 */
function emit(level: LogLevel, args: unknown[]): void {
  const text = formatArgs(args);
  const match = text.match(TAG_PATTERN);
  if (match) {
    logger[level]({ tag: match[1].toLowerCase() }, text.slice(match[0].length));
  } else {
    logger[level](text);
  }
}

console.log = (...args: unknown[]) => emit('info', args);
console.info = (...args: unknown[]) => emit('info', args);
console.warn = (...args: unknown[]) => emit('warn', args);
console.error = (...args: unknown[]) => emit('error', args);
console.debug = (...args: unknown[]) => emit('debug', args);

export default logger;
