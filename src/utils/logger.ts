import { format } from 'node:util';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/** Receives every formatted log line, e.g. to forward it to the editor. */
export type LogSink = (level: LogLevel, message: string) => void;

let sink: LogSink | undefined;

export function attachLogSink(next: LogSink | undefined): void {
  sink = next;
}

function write(level: LogLevel, args: unknown[]): void {
  // stdout carries the protocol; the console goes to stderr only.
  console.error(`[${level.toUpperCase()}]`, ...args);
  sink?.(level, format(...args));
}

export const logger = {
  info: (...args: unknown[]) => write('info', args),
  warn: (...args: unknown[]) => write('warn', args),
  error: (...args: unknown[]) => write('error', args),
  debug: (...args: unknown[]) => {
    if (process.env.DEBUG) write('debug', args);
  },
};
