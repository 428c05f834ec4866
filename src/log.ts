export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Logger whose lines also carry `fields`. */
  child(fields: LogFields): Logger;
}

/** Where lines go. Defaults to the console; tests pass an array-backed sink. */
export interface LogSink {
  error(line: string): void;
  warn(line: string): void;
  log(line: string): void;
}

function isPlainObject(v: unknown): v is LogFields {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fmtMeta(fields: LogFields, meta: unknown) {
  const merged = meta === undefined ? fields : isPlainObject(meta) ? { ...fields, ...meta } : meta;
  if (merged === undefined) return '';
  if (isPlainObject(merged) && Object.keys(merged).length === 0) return '';
  if (typeof merged === 'string') return Object.keys(fields).length ? ` ${JSON.stringify(fields)} ${merged}` : ` ${merged}`;
  try {
    return ` ${JSON.stringify(merged)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

const SILENT: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  child: () => SILENT,
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = console, fields: LogFields = {}): Logger {
  if (level === 'silent') return SILENT;

  const threshold = ORDER[level];
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} `;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) sink.error(prefix('error') + msg + fmtMeta(fields, meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) sink.warn(prefix('warn') + msg + fmtMeta(fields, meta));
    },
    info: (msg, meta) => {
      if (can('info')) sink.log(prefix('info') + msg + fmtMeta(fields, meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) sink.log(prefix('debug') + msg + fmtMeta(fields, meta));
    },
    child: (more) => createLogger(level, sink, { ...fields, ...more }),
  };
}
