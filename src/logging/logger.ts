export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(event: string, context?: LogContext): void;
  info(event: string, context?: LogContext): void;
  warn(event: string, context?: LogContext): void;
  error(event: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogSink = (level: LogLevel, line: string) => void;

function consoleSink(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** One JSON object per line: `{"level","event","time",...context}`. */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = "info",
    private readonly sink: LogSink = consoleSink,
    private readonly clock: () => Date = () => new Date()
  ) {}

  debug(event: string, context?: LogContext): void {
    this.emit("debug", event, context);
  }

  info(event: string, context?: LogContext): void {
    this.emit("info", event, context);
  }

  warn(event: string, context?: LogContext): void {
    this.emit("warn", event, context);
  }

  error(event: string, context?: LogContext): void {
    this.emit("error", event, context);
  }

  private emit(level: LogLevel, event: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const entry = { level, event, time: this.clock().toISOString(), ...(context ?? {}) };
    this.sink(level, JSON.stringify(entry));
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
