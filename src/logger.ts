// logger.ts
// Leveled console logging for lineage extraction. Hosts that route logs
// elsewhere pass their own instance (or a silent one) to the extractor.

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private level: LogLevel;
  private context: string;
  private silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? "debug" : "info");
    this.context = options.context ?? "";
    this.silent = options.silent ?? false;
  }

  /**
   * Logger sharing this one's level and silence, with a nested context.
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : "";
    const output = `[${level}]${ctx} ${message}`;
    return data ? `${output} ${JSON.stringify(data)}` : output;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("debug")) {
      console.log(this.format("debug", message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("info")) {
      console.log(this.format("info", message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("warn")) {
      console.warn(this.format("warn", message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("error")) {
      console.error(this.format("error", message, data));
    }
  }
}
