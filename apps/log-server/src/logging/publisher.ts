import { RingBuffer } from "./ringBuffer.js";
import type { LogLevel, LogRecord } from "./logTypes.js";

export type LogFilter = {
  minLevel?: LogLevel;
  scope?: string;
  search?: string;
};

export type BufferStats = {
  size: number;
  capacity: number;
  evicted: number;
  lastSequence: number;
};

export type PublisherOptions = {
  capacity?: number;
  now?: () => number;
  onListenerError?: (err: unknown) => void;
};

type Listener = (record: LogRecord) => void;

function reportListenerError(err: unknown): void {
  process.emitWarning(err instanceof Error ? err : String(err), "LogListenerWarning");
}

/**
 * 日志发布器：分配 sequence、写入环形缓冲区并通知订阅者。
 *
 * sequence 计数器只属于发布器本身，从 0 开始、进程生命周期内只增不减（clear 也不会重置）。
 */
export class Publisher {
  private readonly buffer: RingBuffer;
  private readonly now: () => number;
  private readonly onListenerError: (err: unknown) => void;
  private readonly listeners = new Set<Listener>();
  private sequence = 0;

  constructor(opts: PublisherOptions = {}) {
    this.buffer = new RingBuffer(opts.capacity ?? 3000);
    this.now = opts.now ?? Date.now;
    this.onListenerError = opts.onListenerError ?? reportListenerError;
  }

  get lastSequence(): number {
    return this.sequence;
  }

  /**
   * 写入一条日志。不会向调用方抛出异常。
   */
  publish(level: LogLevel, message: string, opts: { scope?: string } = {}): LogRecord {
    this.sequence += 1;
    const record: LogRecord = Object.freeze({
      sequence: this.sequence,
      timestamp: this.now(),
      level,
      message: String(message),
      ...(opts.scope ? { scope: opts.scope } : {}),
    });
    this.buffer.append(record);

    for (const fn of this.listeners) {
      try {
        fn(record);
      } catch (err) {
        this.onListenerError(err);
      }
    }
    return record;
  }

  /**
   * 订阅新增日志事件；返回取消订阅函数。
   */
  onAppend(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(minLevel: LogLevel, afterSequence: number): LogRecord[] {
    return this.buffer.snapshot(minLevel, afterSequence);
  }

  /**
   * 根据条件查询内存日志（等级下限 + scope + 搜索 + 分页），最新的在前。
   */
  query(opts: { filter?: LogFilter; page: number; pageSize: number }): {
    items: LogRecord[];
    total: number;
  } {
    const { filter, page, pageSize } = opts;
    let list = this.buffer.snapshot(filter?.minLevel ?? "trace", 0);
    if (filter?.scope) list = list.filter((r) => r.scope === filter.scope);
    if (filter?.search) {
      const q = filter.search.toLowerCase();
      list = list.filter((r) => `${r.scope ?? ""} ${r.message}`.toLowerCase().includes(q));
    }
    list.reverse();
    const total = list.length;
    const start = (page - 1) * pageSize;
    const items = list.slice(start, start + pageSize);
    return { items, total };
  }

  /**
   * 获取最近 N 条日志。
   */
  tail(limit: number): LogRecord[] {
    if (limit <= 0) return [];
    return this.buffer.toArray().slice(-limit);
  }

  getBySequence(sequence: number): LogRecord | null {
    return this.buffer.find(sequence);
  }

  clear(): number {
    return this.buffer.clear();
  }

  stats(): BufferStats {
    return {
      size: this.buffer.size,
      capacity: this.buffer.capacity,
      evicted: this.buffer.evicted,
      lastSequence: this.sequence,
    };
  }
}
