import { Logger, LogLevel } from '../types/index.js';

/**
 * Receives one formatted log entry. The default writes to stderr so that
 * command results on stdout stay pipeable with --verbose.
 */
export type LogSink = (entry: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO] ',
  [LogLevel.WARN]: '[WARN] ',
  [LogLevel.ERROR]: '[ERROR]'
};

// Sets (node tags) serialize as arrays; JSON.stringify(new Error()) is {}.
function metaReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta !== null && typeof meta === 'object') {
    return `\n${JSON.stringify(meta, metaReplacer, 2)}`;
  }
  return ` ${String(meta)}`;
}

/**
 * Level-filtered console logger. Entries read `<ISO time> <[LEVEL]> message`,
 * followed by indented JSON when metadata is an object.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = entry => console.error(entry),
    private readonly now: () => Date = () => new Date()
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    this.sink(`${this.now().toISOString()} ${LEVEL_LABEL[level]} ${message}${formatMeta(meta)}`);
  }
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.STRATA_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnv());
