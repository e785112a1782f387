import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevel, type LogLevelName, LogLevels } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type MemoryLogEntry = {
  level: LogLevelName
  message: string
  /** Context of the emitting logger merged with the entry's meta. */
  fields: Record<string, unknown>
}

const severity: Record<LogLevelName, LogLevel> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

/**
 * Keeps entries in an array instead of writing them anywhere. Children append
 * to their parent's array, so one instance observes a whole logger tree.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly context: LogContextPatch = {},
    readonly entries: MemoryLogEntry[] = [],
  ) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.opts, { ...this.context, ...context }, this.entries)
  }

  clear(): void {
    this.entries.length = 0
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (severity[level] < severity[this.opts.level ?? "trace"]) return
    this.entries.push({ level, message, fields: { ...this.context, ...meta } })
  }
}

export function createMemoryLogger<TContext extends LogContext = LogContext>(
  opts: Partial<LoggerOptions> = {},
): MemoryLogger<TContext> {
  return new MemoryLogger<TContext>(opts)
}
