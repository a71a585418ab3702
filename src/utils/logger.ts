export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Fixed fields added to every record, e.g. the run id. */
  bindings?: Record<string, unknown>;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ ...this.opts, bindings: { ...this.opts.bindings, ...bindings } });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const bindings = this.opts.bindings;

    if (this.opts.json) {
      process.stderr.write(`${JSON.stringify({ timestamp, level, message, ...bindings, data })}\n`);
      return;
    }

    const prefix = bindings ? ` ${safeJson(bindings)}` : '';
    const line =
      data === undefined
        ? `${timestamp} ${level}${prefix} ${message}`
        : `${timestamp} ${level}${prefix} ${message} ${safeJson(data)}`;
    process.stderr.write(`${line}\n`);
  }
}

export const silentLogger = new Logger({ level: 'silent' });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
