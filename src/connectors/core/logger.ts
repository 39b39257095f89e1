import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Line sink for log output. Standard output belongs to the message stream. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class ConsoleLogger implements Logger {
  private readonly component: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(component: string, level: LogLevel = "info", sink = stderrSink) {
    this.component = component;
    this.level = level;
    this.sink = sink;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write("debug", "", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write("info", "", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write("warn", "⚠ ", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write("error", "✗ ", msg, data);
  }

  child(component: string): Logger {
    return new ConsoleLogger(
      `${this.component}:${component}`,
      this.level,
      this.sink,
    );
  }

  private write(
    level: LogLevel,
    marker: string,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    this.sink(`[${this.component}] ${marker}${msg}${extra}`);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createLogger(
  component: string,
  level: LogLevel = "info",
  sink?: LogSink,
): Logger {
  return new ConsoleLogger(component, level, sink);
}
