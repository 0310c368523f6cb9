/**
 * Leveled console logger with a context prefix
 *
 * @module utils/logger
 */
import type { LogLevel } from "../types.js";

type EmittingLevel = Exclude<LogLevel, "silent">;

/**
 * Destination for log lines; `console` satisfies it
 */
export type LogSink = Record<EmittingLevel, (message: string, ...meta: unknown[]) => void>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger bound to a context tag, e.g. `[hoverfly] started`
 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = console
  ) {}

  debug(message: string, meta?: unknown): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log("error", message, meta);
  }

  /**
   * Whether messages at `level` are emitted
   */
  isEnabled(level: EmittingLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: EmittingLevel, message: string, meta?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = `[${this.context}] ${message}`;
    if (meta === undefined) {
      this.sink[level](line);
    } else {
      this.sink[level](line, meta);
    }
  }
}

/**
 * Create a logger for a component
 * @param context - Tag printed before every message
 * @param level - Minimum level to emit (default: "info")
 * @param sink - Output target (default: console)
 */
export function createLogger(context: string, level: LogLevel = "info", sink?: LogSink): Logger {
  return new Logger(context, level, sink);
}
