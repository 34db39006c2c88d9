import type { ViewerConfig } from "../env.js";
import { describeError, type Logger } from "../logging/logger.js";
import type { LogLevel } from "../logging/logTypes.js";
import type { Publisher } from "../logging/publisher.js";
import {
  clampRefreshInterval,
  parseClientMessage,
  StreamStatus,
  toWireRecord,
  type ConnectParams,
  type ServerMessage,
  type TerminationReason,
} from "./protocol.js";

export type SubscriptionState = "connected" | "streaming" | "disconnected" | "error";

/**
 * 订阅所依赖的最小传输接口（生产环境由 ws 的 WebSocket 实现）。
 */
export type ViewerTransport = {
  readonly bufferedAmount: number;
  isOpen(): boolean;
  send(data: string, cb: (err?: Error) => void): void;
  close(code: number, reason: string): void;
};

export type SubscriptionOptions = {
  id: string;
  publisher: Publisher;
  transport: ViewerTransport;
  config: ViewerConfig;
  params: ConnectParams;
  log: Logger;
  onEnd?: (subscription: Subscription) => void;
};

type FrameRange = { from: number; through: number };

const CloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  PolicyViolation: 1008,
  InternalError: 1011,
  TryAgainLater: 1013,
} as const;

/**
 * 单个查看器的实时订阅：connected -> streaming -> disconnected | error。
 *
 * streaming 期间运行一个独立的异步循环：推送一批 -> 等待刷新间隔或新数据信号 -> 再推送。
 */
export class Subscription {
  readonly id: string;
  private readonly publisher: Publisher;
  private readonly transport: ViewerTransport;
  private readonly config: ViewerConfig;
  private readonly log: Logger;
  private readonly onEnd?: (subscription: Subscription) => void;

  private state: SubscriptionState = "connected";
  private endReason: TerminationReason | null = null;
  private minLevel: LogLevel;
  private refreshIntervalMs: number;
  private cursor: number;
  private pendingFrames = 0;
  private sendFailures = 0;
  private ackedCursor = 0;
  private lastFlushAt = 0;
  private tickTimer: NodeJS.Timeout | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;
  private loop: Promise<void> = Promise.resolve();

  constructor(opts: SubscriptionOptions) {
    this.id = opts.id;
    this.publisher = opts.publisher;
    this.transport = opts.transport;
    this.config = opts.config;
    this.log = opts.log;
    this.onEnd = opts.onEnd;
    this.minLevel = opts.params.minLevel;
    this.refreshIntervalMs = clampRefreshInterval(opts.params.refreshIntervalMs, opts.config);
    this.cursor = opts.params.cursor;
  }

  get currentState(): SubscriptionState {
    return this.state;
  }

  get reason(): TerminationReason | null {
    return this.endReason;
  }

  get currentCursor(): number {
    return this.cursor;
  }

  get settings(): { minLevel: LogLevel; refreshIntervalMs: number } {
    return { minLevel: this.minLevel, refreshIntervalMs: this.refreshIntervalMs };
  }

  /**
   * 进入 streaming 并立即回放缓冲区中 cursor 之后的记录。
   */
  start(): void {
    if (this.state !== "connected") return;
    this.state = "streaming";
    // 服务重启后 sequence 从 1 重新开始，超前的 cursor 需要收回
    this.cursor = Math.min(this.cursor, this.publisher.lastSequence);
    this.ackedCursor = this.cursor;
    this.resetIdleTimer();
    this.sendSettings();
    this.loop = this.run();
  }

  /**
   * 循环结束（订阅终止）后 resolve。
   */
  whenDone(): Promise<void> {
    return this.loop;
  }

  /**
   * 新数据信号：仅当距上次推送已满一个刷新间隔时才立即唤醒，否则由定时器在间隔结束时推送。
   */
  notify(): void {
    if (!this.isStreaming() || !this.wakeUp) return;
    if (Date.now() - this.lastFlushAt >= this.refreshIntervalMs) this.wake();
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
    if (this.isStreaming()) this.sendSettings();
  }

  setRefreshInterval(ms: number): void {
    this.refreshIntervalMs = clampRefreshInterval(ms, this.config);
    if (!this.isStreaming()) return;
    if (this.wakeUp) this.armTimer();
    this.sendSettings();
  }

  handleMessage(raw: string): void {
    if (!this.isStreaming()) return;
    this.resetIdleTimer();
    const msg = parseClientMessage(raw);
    if (!msg) {
      this.terminate("error", "protocol-violation", CloseCode.PolicyViolation);
      this.log.warn(`${this.id} protocol violation, subscription terminated`);
      return;
    }
    switch (msg.type) {
      case "ping":
        this.sendFrame({ type: "pong" });
        return;
      case "filter":
        this.setMinLevel(msg.minLevel);
        return;
      case "refresh":
        this.setRefreshInterval(msg.refreshIntervalMs);
        return;
      case "close":
        this.close("closed");
        return;
    }
  }

  /**
   * 正常终止：发送 status=2 的终止帧后关闭连接。
   */
  close(reason: TerminationReason = "closed"): void {
    const code = reason === "closed" ? CloseCode.Normal : CloseCode.GoingAway;
    this.terminate("disconnected", reason, code);
  }

  /**
   * 对端已关闭连接。
   */
  transportClosed(): void {
    this.end("disconnected", "peer-closed");
  }

  /**
   * 不可恢复的传输错误：记录日志并拆除订阅，不重试。
   */
  fail(err: unknown): void {
    if (this.isEnded()) return;
    this.end("error", "transport-fault", CloseCode.InternalError);
    this.log.error(`${this.id} transport fault: ${describeError(err)}`);
  }

  private async run(): Promise<void> {
    try {
      while (this.isStreaming()) {
        this.flush();
        if (this.isStreaming()) await this.nextTick();
      }
    } catch (err) {
      this.fail(err);
    }
  }

  private flush(): void {
    if (this.overloaded()) {
      const pending = this.pendingFrames;
      const buffered = this.transport.bufferedAmount;
      this.end("disconnected", "backpressure", CloseCode.TryAgainLater);
      this.log.warn(`${this.id} dropped: ${pending} frames pending, ${buffered} bytes buffered`);
      return;
    }
    this.lastFlushAt = Date.now();
    const from = this.cursor;
    const records = this.publisher.snapshot(this.minLevel, from);
    // 被过滤掉的记录同样越过，之后修改过滤条件也不会补发
    this.cursor = Math.max(from, this.publisher.lastSequence);
    this.sendFrame(
      {
        type: "logs",
        status: records.length > 0 ? StreamStatus.Ok : StreamStatus.NoData,
        cursor: this.cursor,
        records: records.map(toWireRecord),
      },
      { from, through: this.cursor }
    );
  }

  private nextTick(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wakeUp = resolve;
      this.armTimer();
    });
  }

  private armTimer(): void {
    if (this.tickTimer) clearTimeout(this.tickTimer);
    const delay = Math.max(0, this.lastFlushAt + this.refreshIntervalMs - Date.now());
    this.tickTimer = setTimeout(() => this.wake(), delay);
  }

  private wake(): void {
    if (this.tickTimer) clearTimeout(this.tickTimer);
    this.tickTimer = null;
    const resolve = this.wakeUp;
    this.wakeUp = null;
    resolve?.();
  }

  private overloaded(): boolean {
    return (
      this.pendingFrames >= this.config.maxPendingFrames ||
      this.transport.bufferedAmount > this.config.maxBufferedBytes
    );
  }

  private sendSettings(): void {
    this.sendFrame({
      type: "settings",
      minLevel: this.minLevel,
      refreshIntervalMs: this.refreshIntervalMs,
      cursor: this.cursor,
    });
  }

  /**
   * range 仅数据帧携带：成功时推进已确认的 cursor，失败时用于回退。
   */
  private sendFrame(message: ServerMessage, range?: FrameRange): void {
    this.pendingFrames += 1;
    this.transport.send(JSON.stringify(message), (err) => this.onSent(err, range));
  }

  private onSent(err: Error | undefined, range: FrameRange | undefined): void {
    this.pendingFrames -= 1;
    if (!this.isStreaming()) return;
    if (!err) {
      this.sendFailures = 0;
      if (range) this.ackedCursor = Math.max(this.ackedCursor, range.through);
      return;
    }
    if (!this.transport.isOpen()) {
      this.end("disconnected", "write-failed");
      return;
    }
    // 暂时性失败：回退 cursor，下个周期重发；
    // 之后的帧已确认送达时不回退，避免重复投递（失败帧中的记录丢弃）
    this.sendFailures += 1;
    if (range && range.from >= this.ackedCursor) this.cursor = Math.min(this.cursor, range.from);
    if (this.sendFailures > this.config.maxSendFailures) {
      this.fail(err);
      return;
    }
    this.log.warn(`${this.id} send failed (${this.sendFailures}/${this.config.maxSendFailures}): ${err.message}`);
  }

  private terminate(next: "disconnected" | "error", reason: TerminationReason, closeCode: number): void {
    if (this.isEnded()) return;
    if (this.transport.isOpen()) {
      this.sendFrame({ type: "logs", status: StreamStatus.Terminated, cursor: this.cursor, records: [], reason });
    }
    this.end(next, reason, closeCode);
  }

  private end(next: "disconnected" | "error", reason: TerminationReason, closeCode?: number): void {
    if (this.isEnded()) return;
    this.state = next;
    this.endReason = reason;
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = null;
    this.wake();
    if (closeCode !== undefined && this.transport.isOpen()) this.transport.close(closeCode, reason);
    this.onEnd?.(this);
  }

  private resetIdleTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => {
      this.close("idle-timeout");
      this.log.info(`${this.id} idle for ${this.config.idleTimeoutMs}ms, closed`);
    }, this.config.idleTimeoutMs);
  }

  private isStreaming(): boolean {
    return this.state === "streaming";
  }

  private isEnded(): boolean {
    return this.state === "disconnected" || this.state === "error";
  }
}
