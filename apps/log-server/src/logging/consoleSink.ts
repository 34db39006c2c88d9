import type { Publisher } from "./publisher.js";
import { isAtLeast, type LogLevel, type LogRecord } from "./logTypes.js";

export type LineWriter = {
  write(chunk: string): unknown;
};

export function formatLine(record: LogRecord): string {
  const scope = record.scope ? ` [${record.scope}]` : "";
  return `${new Date(record.timestamp).toISOString()} [${record.level.toUpperCase()}]${scope} ${record.message}`;
}

/**
 * 将日志镜像到终端：warn/error 写 stderr，其余写 stdout。返回取消函数。
 */
export function attachConsoleSink(
  publisher: Publisher,
  opts: { out?: LineWriter; err?: LineWriter; minLevel?: LogLevel } = {}
): () => void {
  const out = opts.out ?? process.stdout;
  const err = opts.err ?? process.stderr;
  const minLevel = opts.minLevel ?? "trace";
  return publisher.onAppend((record) => {
    if (!isAtLeast(record.level, minLevel)) return;
    const target = isAtLeast(record.level, "warn") ? err : out;
    target.write(`${formatLine(record)}\n`);
  });
}
