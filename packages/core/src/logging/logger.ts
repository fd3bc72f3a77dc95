import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  runId?: string;
  [key: string]: unknown;
};

/** Destination for rendered log lines (stderr unless overridden) */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && typeof value.code === 'string') out.code = value.code;
    return out;
  }
  return value;
}

function renderField(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(toLoggable(value));
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  private write(line: string): void {
    if (this.options.sink) {
      this.options.sink(line);
      return;
    }
    // stdout is reserved for the CLI's result line.
    process.stderr.write(`${line}\n`);
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(extra ?? {})) {
      if (value !== undefined) fields[key] = toLoggable(value);
    }

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    if ((this.options.format ?? 'text') === 'json') {
      this.write(JSON.stringify(record));
      return;
    }

    const { ts, level: _level, msg: _msg, runId, ...rest } = record;
    const runPart = runId ? ` run=${runId}` : '';
    const restPart = Object.entries(rest)
      .map(([key, value]) => ` ${key}=${renderField(value)}`)
      .join('');
    this.write(`[${ts}] ${level.toUpperCase()}${runPart} ${msg}${restPart}`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/** Logger that discards everything; default for library callers */
export const silentLogger = new Logger({ level: 'error', sink: () => undefined });

export function createRunId(): string {
  return randomUUID();
}
