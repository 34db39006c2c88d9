import http from "node:http";
import { createApp } from "./app.js";
import { getEnv, toViewerConfig } from "./env.js";
import { attachConsoleSink } from "./logging/consoleSink.js";
import { createLogger, describeError } from "./logging/logger.js";
import { Publisher } from "./logging/publisher.js";
import { ViewerHub } from "./ws/viewerHub.js";

async function main(): Promise<void> {
  const env = getEnv();
  const publisher = new Publisher({ capacity: env.LOG_CAPACITY });
  if (env.LOG_CONSOLE) attachConsoleSink(publisher);

  const log = createLogger(publisher, "system");
  const hub = new ViewerHub({ publisher, config: toViewerConfig(env), log: createLogger(publisher, "viewer") });
  const app = createApp({
    env,
    publisher,
    log: createLogger(publisher, "http"),
    getViewerCount: () => hub.getClientCount(),
  });

  const server = http.createServer(app);
  hub.attach(server, "/ws");

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(env.PORT, env.HOST, () => {
      server.off("error", reject);
      resolve();
    });
  });
  log.info(`listening on http://${env.HOST}:${env.PORT} (viewer at /ws, buffer capacity ${env.LOG_CAPACITY})`);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down`);
    await hub.close();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error(`shutdown failed: ${describeError(err)}`);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`log-server failed to start: ${describeError(err)}\n`);
  process.exitCode = 1;
});
