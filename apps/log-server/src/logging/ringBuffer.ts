import { isAtLeast, type LogLevel, type LogRecord } from "./logTypes.js";

/**
 * 固定容量的环形日志缓冲区，按 sequence 递增顺序保存最近 capacity 条记录。
 *
 * 所有方法都是同步的：在 Node 事件循环中每次调用都会完整执行，
 * 因此 append 之间天然串行，snapshot 总能看到一致的缓冲区状态。
 */
export class RingBuffer {
  readonly capacity: number;
  private readonly slots: Array<LogRecord | undefined>;
  private head = 0;
  private count = 0;
  private evictedCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<LogRecord | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  get evicted(): number {
    return this.evictedCount;
  }

  get latestSequence(): number {
    if (this.count === 0) return 0;
    return this.at(this.count - 1).sequence;
  }

  /**
   * 追加一条记录；已满时覆盖最旧的一条。
   */
  append(record: LogRecord): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = record;
    if (this.count === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
      this.evictedCount += 1;
    } else {
      this.count += 1;
    }
  }

  /**
   * 返回 level >= minLevel 且 sequence > afterSequence 的记录（升序）。
   */
  snapshot(minLevel: LogLevel, afterSequence: number): LogRecord[] {
    const out: LogRecord[] = [];
    for (let i = this.firstIndexAfter(afterSequence); i < this.count; i += 1) {
      const record = this.at(i);
      if (isAtLeast(record.level, minLevel)) out.push(record);
    }
    return out;
  }

  find(sequence: number): LogRecord | null {
    const i = this.firstIndexAfter(sequence - 1);
    if (i >= this.count) return null;
    const record = this.at(i);
    return record.sequence === sequence ? record : null;
  }

  toArray(): LogRecord[] {
    const out: LogRecord[] = [];
    for (let i = 0; i < this.count; i += 1) out.push(this.at(i));
    return out;
  }

  /**
   * 清空缓冲区，返回被移除的条数。
   */
  clear(): number {
    const removed = this.count;
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.evictedCount = 0;
    return removed;
  }

  private at(i: number): LogRecord {
    const record = this.slots[(this.head + i) % this.capacity];
    if (record === undefined) throw new Error(`ring buffer slot ${i} is empty`);
    return record;
  }

  // 二分查找第一个 sequence > afterSequence 的逻辑下标
  private firstIndexAfter(afterSequence: number): number {
    let lo = 0;
    let hi = this.count;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.at(mid).sequence <= afterSequence) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
