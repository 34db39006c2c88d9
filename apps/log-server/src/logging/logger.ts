import type { Publisher } from "./publisher.js";
import type { LogLevel, LogRecord } from "./logTypes.js";

export class TodoError extends Error {
  constructor(message: string) {
    super(`not implemented: ${message}`);
    this.name = "TodoError";
  }
}

export type Logger = {
  readonly scope: string | undefined;
  trace(message: string): LogRecord;
  debug(message: string): LogRecord;
  info(message: string): LogRecord;
  warn(message: string): LogRecord;
  error(message: string): LogRecord;
  /**
   * 记录一条 TODO 警告后抛出 TodoError，用于标记尚未实现的分支。
   */
  todo(message: string): never;
  child(scope: string): Logger;
};

/**
 * 基于 Publisher 的带 scope 日志门面。
 */
export function createLogger(publisher: Publisher, scope?: string): Logger {
  const at = (level: LogLevel) => (message: string) => publisher.publish(level, message, { scope });
  return {
    scope,
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    todo(message: string): never {
      publisher.publish("warn", `TODO: ${message}`, { scope });
      throw new TodoError(message);
    },
    child(next: string): Logger {
      return createLogger(publisher, scope ? `${scope}:${next}` : next);
    },
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
