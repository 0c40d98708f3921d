import type { Writable } from 'node:stream';

import { ConfigurationError } from './errors';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

export type LogMeta = Record<string, unknown>;

export type LogRecord = LogMeta & {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
};

export type LoggerOptions = {
  /**
   * Most verbose level that is still written.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * One JSON record per line instead of the text layout.
   */
  json?: boolean;

  /**
   * Drops timestamp and level label: `[component] message {meta}`.
   */
  minimal?: boolean;

  /**
   * Label rendered in brackets in front of each message.
   */
  component?: string;

  /**
   * @default process.stderr
   */
  destination?: Writable;

  /**
   * Receives a copy of every record that passes the level filter.
   */
  sink?: (record: LogRecord) => void;
};

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly minimal: boolean;
  private readonly component?: string;
  private readonly stream: Writable;
  private readonly sink?: (record: LogRecord) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.json = Boolean(options.json);
    this.minimal = Boolean(options.minimal);
    this.component = options.component;
    this.stream = options.destination ?? process.stderr;
    this.sink = options.sink;
  }

  child(overrides: LoggerOptions): Logger {
    return new Logger({
      level: overrides.level ?? this.level,
      json: overrides.json ?? this.json,
      minimal: overrides.minimal ?? this.minimal,
      component: overrides.component ?? this.component,
      destination: overrides.destination ?? this.stream,
      sink: overrides.sink ?? this.sink
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const hasMeta = meta !== undefined && Object.keys(meta).length > 0;
    const record: LogRecord = {
      ...(hasMeta ? meta : {}),
      timestamp,
      level,
      message,
      component: this.component
    };

    if (this.json) {
      this.stream.write(JSON.stringify(record) + '\n');
    } else if (this.minimal) {
      const segments: string[] = [];
      if (this.component) segments.push(`[${this.component}]`);
      segments.push(message);
      if (hasMeta) segments.push(JSON.stringify(meta));
      this.stream.write(segments.join(' ') + '\n');
    } else {
      const parts = [timestamp, level.toUpperCase()];
      if (this.component) parts.push(`[${this.component}]`);
      parts.push('-', message);
      if (hasMeta) parts.push(JSON.stringify(meta));
      this.stream.write(parts.join(' ') + '\n');
    }

    this.sink?.({ ...record });
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

export function normalizeLogLevel(input?: string | null): LogLevel {
  if (!input) {
    return 'info';
  }
  const normalized = input.toLowerCase();
  if (
    normalized === 'error' ||
    normalized === 'warn' ||
    normalized === 'info' ||
    normalized === 'debug'
  ) {
    return normalized;
  }
  throw new ConfigurationError(
    `Invalid log level: ${input}. Use error | warn | info | debug.`,
    { details: { level: input } }
  );
}
