import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogRecord = Readonly<{
  sequence: number;
  timestamp: number;
  level: LogLevel;
  message: string;
  scope?: string;
}>;

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * 判断 level 是否不低于 min。
 */
export function isAtLeast(level: LogLevel, min: LogLevel): boolean {
  return levelRank(level) >= levelRank(min);
}
