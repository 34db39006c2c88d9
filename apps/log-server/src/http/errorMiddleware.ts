import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { describeError, type Logger } from "../logging/logger.js";
import { HttpError } from "./httpErrors.js";

/**
 * 统一错误响应：参数校验 400，HttpError 按其 status，其余 500 并记录日志。
 */
export function errorMiddleware(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: "VALIDATION_ERROR", issues: err.issues });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.code });
      return;
    }
    log.error(`${req.method} ${req.path} failed: ${describeError(err)}`);
    res.status(500).json({ error: "INTERNAL_ERROR" });
  };
}
