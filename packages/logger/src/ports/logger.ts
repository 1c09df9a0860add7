import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a logger that inherits this logger's context plus `context`.
   *
   * Fields are merged shallowly; the child wins on conflict and the parent
   * is left untouched. Used to scope lines to a module or a source.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
