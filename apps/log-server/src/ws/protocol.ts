import { z } from "zod";
import type { ViewerConfig } from "../env.js";
import { LogLevelSchema, type LogLevel, type LogRecord } from "../logging/logTypes.js";

export const StreamStatus = {
  Ok: 0,
  NoData: 1,
  Terminated: 2,
} as const;

export type StreamStatus = (typeof StreamStatus)[keyof typeof StreamStatus];

export type TerminationReason =
  | "closed"
  | "peer-closed"
  | "idle-timeout"
  | "backpressure"
  | "write-failed"
  | "transport-fault"
  | "protocol-violation"
  | "server-shutdown";

export type WireRecord = {
  level: LogLevel;
  timestamp: number;
  message: string;
  sequence: number;
  scope?: string;
};

export type ServerMessage =
  | { type: "logs"; status: StreamStatus; cursor: number; records: WireRecord[]; reason?: TerminationReason }
  | { type: "settings"; minLevel: LogLevel; refreshIntervalMs: number; cursor: number }
  | { type: "pong" };

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("filter"), minLevel: LogLevelSchema }),
  z.object({ type: z.literal("refresh"), refreshIntervalMs: z.number().int().positive() }),
  z.object({ type: z.literal("close") }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

const ConnectQuerySchema = z.object({
  minLevel: LogLevelSchema.optional(),
  refreshIntervalMs: z.coerce.number().int().positive().optional(),
  cursor: z.coerce.number().int().min(0).optional(),
});

export type ConnectParams = {
  minLevel: LogLevel;
  refreshIntervalMs: number;
  cursor: number;
};

export function toWireRecord(record: LogRecord): WireRecord {
  const wire: WireRecord = {
    level: record.level,
    timestamp: record.timestamp,
    message: record.message,
    sequence: record.sequence,
  };
  if (record.scope !== undefined) wire.scope = record.scope;
  return wire;
}

/**
 * 刷新间隔不得低于配置的最小值（过低则抬升，而非拒绝）。
 */
export function clampRefreshInterval(ms: number, config: ViewerConfig): number {
  return Math.max(ms, config.minRefreshIntervalMs);
}

/**
 * 解析 WebSocket 连接的 query 参数；非法时返回 null。
 */
export function parseConnectParams(params: URLSearchParams, config: ViewerConfig): ConnectParams | null {
  const parsed = ConnectQuerySchema.safeParse(Object.fromEntries(params));
  if (!parsed.success) return null;
  return {
    minLevel: parsed.data.minLevel ?? config.defaultMinLevel,
    refreshIntervalMs: clampRefreshInterval(
      parsed.data.refreshIntervalMs ?? config.defaultRefreshIntervalMs,
      config
    ),
    cursor: parsed.data.cursor ?? 0,
  };
}

/**
 * 解析客户端消息；JSON 错误或字段不合法都视为协议违规，返回 null。
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ClientMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
