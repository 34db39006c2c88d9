import { z } from "zod";
import { LogLevelSchema, type LogLevel } from "./logging/logTypes.js";

const BooleanFlag = z
  .enum(["true", "false", "1", "0", "on", "off"])
  .transform((v) => v === "true" || v === "1" || v === "on");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().default("0.0.0.0"),
  LOG_CAPACITY: z.coerce.number().int().min(1).max(1_000_000).default(3000),
  LOG_CONSOLE: BooleanFlag.default("true"),
  VIEWER_MIN_LEVEL: LogLevelSchema.default("trace"),
  VIEWER_REFRESH_MS: z.coerce.number().int().min(1).default(1000),
  VIEWER_MIN_REFRESH_MS: z.coerce.number().int().min(1).default(200),
  VIEWER_MAX_PENDING_FRAMES: z.coerce.number().int().min(1).default(64),
  VIEWER_MAX_BUFFERED_BYTES: z.coerce.number().int().min(1024).default(1_048_576),
  VIEWER_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
  VIEWER_MAX_SEND_FAILURES: z.coerce.number().int().min(0).default(3),
  VIEWER_DIST_DIR: z.string().trim().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export type ViewerConfig = Readonly<{
  defaultMinLevel: LogLevel;
  defaultRefreshIntervalMs: number;
  minRefreshIntervalMs: number;
  maxPendingFrames: number;
  maxBufferedBytes: number;
  idleTimeoutMs: number;
  maxSendFailures: number;
}>;

/**
 * 解析并验证运行环境变量。
 */
export function getEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

/**
 * 从环境变量生成启动后不可变的查看器配置。
 */
export function toViewerConfig(env: Env): ViewerConfig {
  return Object.freeze({
    defaultMinLevel: env.VIEWER_MIN_LEVEL,
    defaultRefreshIntervalMs: Math.max(env.VIEWER_REFRESH_MS, env.VIEWER_MIN_REFRESH_MS),
    minRefreshIntervalMs: env.VIEWER_MIN_REFRESH_MS,
    maxPendingFrames: env.VIEWER_MAX_PENDING_FRAMES,
    maxBufferedBytes: env.VIEWER_MAX_BUFFERED_BYTES,
    idleTimeoutMs: env.VIEWER_IDLE_TIMEOUT_MS,
    maxSendFailures: env.VIEWER_MAX_SEND_FAILURES,
  });
}
