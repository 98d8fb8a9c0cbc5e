export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Returns a logger that stamps `bindings` onto every entry. */
  child(bindings: LogContext): Logger;
}

export interface LogSink {
  write(chunk: string): unknown;
}

/** One JSON object per line: `ts`, `level`, `message`, then bound and per-call context. */
export class JsonLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly sink: LogSink = process.stderr,
    private readonly bindings: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...context
    };
    // Credentials are redacted by the auth layer before they reach a context object.
    this.sink.write(`${JSON.stringify(entry)}\n`);
  }

  child(bindings: LogContext): Logger {
    return new JsonLogger(this.minLevel, this.sink, { ...this.bindings, ...bindings });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }
}
