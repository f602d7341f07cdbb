export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

interface LoggerOptions {
  level: LogLevel;
  format: 'json' | 'pretty';
  bindings?: Record<string, unknown>;
  sink?: LogSink;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// eslint-disable-next-line no-console
const consoleSink: LogSink = (line) => console.log(line);

export class Logger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.bindings = options.bindings ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    const hasBindings = Object.keys(this.bindings).length > 0;
    const merged = hasBindings || metadata ? { ...this.bindings, ...metadata } : undefined;

    if (this.format === 'json') {
      const payload = {
        level,
        message,
        metadata: merged ?? null,
        timestamp: new Date().toISOString()
      };
      return JSON.stringify(payload);
    }

    const metadataText = merged ? ` ${JSON.stringify(merged)}` : '';
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${metadataText}`;
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    this.sink(this.formatMessage(level, message, metadata));
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
