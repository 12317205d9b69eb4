import { inspect } from 'node:util';

import type { Loggable, LoggerOptions, LogMessage, Transport } from '../interfaces';
import type { Color, LogFormat, LogLevel, LogMetadataRecord } from '../types';

const RESET = '\x1b[0m';

const ANSI: Record<Color, string> = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, Color> = {
  trace: 'gray',
  debug: 'blue',
  info: 'green',
  notice: 'cyan',
  warn: 'yellow',
  error: 'red',
  fatal: 'magenta',
};

const STDERR_LEVELS: ReadonlySet<LogLevel> = new Set(['error', 'fatal']);

function isLoggable(value: unknown): value is Loggable {
  return typeof value === 'object' && value !== null && 'toLog' in value && typeof value.toLog === 'function';
}

function paint(color: Color, text: string): string {
  return `${ANSI[color]}${text}${RESET}`;
}

function clock(time: number): string {
  const date = new Date(time);

  return [date.getHours(), date.getMinutes(), date.getSeconds()].map(part => String(part).padStart(2, '0')).join(':');
}

function serializeValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }

  return isLoggable(value) ? value.toLog() : value;
}

/**
 * One JSON document per record, errors expanded to `{ name, message, stack }`.
 */
export function formatJsonRecord(message: LogMessage): string {
  return JSON.stringify(message, serializeValue);
}

/**
 * A colored headline followed by the error and the remaining metadata, each as an inspected block.
 */
export function formatPrettyRecord(message: LogMessage, colors: Partial<Record<LogLevel, Color>> = {}): string[] {
  const { level, time, msg, context, reqId, err, ...metadata } = message;
  const color = colors[level] ?? LEVEL_COLORS[level];
  const tags = [reqId === undefined ? '' : `[${reqId}] `, context === undefined ? '' : `[${paint('cyan', context)}] `].join('');
  const lines = [`${paint('gray', clock(time))} ${paint(color, level.toUpperCase().padEnd(6))} ${tags}${paint(color, msg)}`];

  if (err !== undefined) {
    lines.push(inspect(isLoggable(err) ? err.toLog() : err, { colors: true, depth: 2 }));
  }

  const extra: LogMetadataRecord = {};

  for (const [key, value] of Object.entries(metadata)) {
    extra[key] = isLoggable(value) ? value.toLog() : value;
  }

  if (Object.keys(extra).length > 0) {
    lines.push(inspect(extra, { colors: true, depth: 2 }));
  }

  return lines;
}

/**
 * Writes records to the process streams; `error` and `fatal` go to stderr.
 */
export class ConsoleTransport implements Transport {
  constructor(private readonly options: LoggerOptions = {}) {}

  log(message: LogMessage): void {
    const stream = STDERR_LEVELS.has(message.level) ? process.stderr : process.stdout;
    const lines =
      this.resolveFormat() === 'json' ? [formatJsonRecord(message)] : formatPrettyRecord(message, this.options.prettyOptions?.colors);

    stream.write(lines.join('\n') + '\n');
  }

  private resolveFormat(): LogFormat {
    return this.options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
  }
}
