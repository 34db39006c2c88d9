import express from "express";
import cors from "cors";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Env } from "./env.js";
import { errorMiddleware } from "./http/errorMiddleware.js";
import { httpError } from "./http/httpErrors.js";
import type { Logger } from "./logging/logger.js";
import { LogLevelSchema } from "./logging/logTypes.js";
import type { Publisher } from "./logging/publisher.js";

export type Services = {
  env: Env;
  publisher: Publisher;
  log: Logger;
  getViewerCount: () => number;
};

export function createApp(services: Services): express.Express {
  const app = express();

  app.use(
    cors({
      origin: true,
      credentials: false,
    })
  );
  app.use(express.json({ limit: "64kb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, viewers: services.getViewerCount(), buffer: services.publisher.stats() });
  });

  app.get("/api/logs", (req, res) => {
    const query = z
      .object({
        minLevel: LogLevelSchema.optional(),
        scope: z.string().min(1).optional(),
        search: z.string().optional(),
        page: z.coerce.number().int().min(1).default(1),
        pageSize: z.coerce.number().int().min(1).max(500).default(50),
      })
      .parse(req.query);

    const { items, total } = services.publisher.query({
      filter: { minLevel: query.minLevel, scope: query.scope, search: query.search },
      page: query.page,
      pageSize: query.pageSize,
    });

    res.json({ items, total, page: query.page, pageSize: query.pageSize });
  });

  app.post("/api/logs/clear", (_req, res) => {
    const cleared = services.publisher.clear();
    services.log.info(`log buffer cleared (${cleared} records)`);
    res.json({ ok: true, cleared });
  });

  app.get("/api/logs/:sequence", (req, res) => {
    const sequence = z.coerce.number().int().min(1).parse(req.params.sequence);
    const record = services.publisher.getBySequence(sequence);
    if (!record) throw httpError(404, "NOT_FOUND");
    res.json({ record });
  });

  const viewerDir = services.env.VIEWER_DIST_DIR ? path.resolve(services.env.VIEWER_DIST_DIR) : null;
  const viewerIndexPath = viewerDir ? path.join(viewerDir, "index.html") : null;
  if (viewerDir && viewerIndexPath && fs.existsSync(viewerIndexPath)) {
    app.use(express.static(viewerDir));
    app.get("*", (req, res, next) => {
      if (req.path.startsWith("/api/")) return next();
      res.sendFile(viewerIndexPath);
    });
  }

  app.use((_req, _res, next) => next(httpError(404, "NOT_FOUND")));
  app.use(errorMiddleware(services.log));

  return app;
}
