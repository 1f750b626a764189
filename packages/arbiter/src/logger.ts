export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

export interface StructuredLoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  bindings?: Record<string, unknown>;
  now?: () => Date;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/** Serialize bigint fields as binary strings so vectors stay readable. */
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? `0b${value.toString(2)}` : value;
}

export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly bindings: Record<string, unknown>;
  private readonly now: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? stderrSink;
    this.bindings = options.bindings ?? {};
    this.now = options.now ?? (() => new Date());
  }

  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.level,
      sink: this.sink,
      bindings: { ...this.bindings, ...bindings },
      now: this.now,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log("error", message, fields);
  }

  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const record = {
      ts: this.now().toISOString(),
      level,
      message,
      ...this.bindings,
      ...fields,
    };
    this.sink(JSON.stringify(record, replacer));
  }
}

/** Logger that drops everything; the default when none is supplied. */
export const silentLogger = new StructuredLogger({ level: "error", sink: () => {} });
