import type { LogEntry, LogLevel } from "./types.js";

const levelRank: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  OK: 25,
  WARN: 30,
  ERROR: 40,
};

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
}

export interface LoggerOptions {
  component: string;
  level: LogLevel;
  sink?: LogSink;
  /** Suppresses console rendering; entries still reach the sink. */
  quiet?: boolean;
}

const REDACTED_FIELDS = new Set(["privatekey", "secretkey", "apikey", "mnemonic", "seed"]);

/** Replaces values of secret-looking fields at any depth. */
export function redactSecrets(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (REDACTED_FIELDS.has(key.toLowerCase())) {
      redacted[key] = "[REDACTED]";
    } else if (value !== null && typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
      redacted[key] = redactSecrets({ ...value });
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

export class Logger {
  private readonly component: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink | undefined;
  private readonly quiet: boolean;

  public constructor(options: LoggerOptions) {
    this.component = options.component;
    this.minLevel = options.level;
    this.sink = options.sink;
    this.quiet = options.quiet ?? false;
  }

  /** Same level and sink, different component tag. */
  public child(component: string): Logger {
    return new Logger({
      component,
      level: this.minLevel,
      quiet: this.quiet,
      ...(this.sink ? { sink: this.sink } : {}),
    });
  }

  public debug(code: string, message: string, data?: Record<string, unknown>): void {
    void this.log("DEBUG", code, message, data);
  }

  public info(code: string, message: string, data?: Record<string, unknown>): void {
    void this.log("INFO", code, message, data);
  }

  public ok(code: string, message: string, data?: Record<string, unknown>): void {
    void this.log("OK", code, message, data);
  }

  public warn(code: string, message: string, data?: Record<string, unknown>): void {
    void this.log("WARN", code, message, data);
  }

  public error(code: string, message: string, data?: Record<string, unknown>): void {
    void this.log("ERROR", code, message, data);
  }

  private async log(level: LogLevel, code: string, message: string, data?: Record<string, unknown>): Promise<void> {
    if (levelRank[level] < levelRank[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      code,
      message,
    };
    if (data) {
      entry.data = redactSecrets(data);
    }

    if (!this.quiet) {
      const rendered = `[${entry.ts}] [${level}] [${this.component}] ${code} ${message}${
        entry.data ? ` ${JSON.stringify(entry.data, bigintReplacer)}` : ""
      }`;

      if (level === "ERROR") {
        // eslint-disable-next-line no-console
        console.error(rendered);
      } else {
        // eslint-disable-next-line no-console
        console.log(rendered);
      }
    }

    if (this.sink) {
      try {
        await this.sink.write(entry);
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error(`[${entry.ts}] [ERROR] [${this.component}] LOG_SINK_FAIL ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
