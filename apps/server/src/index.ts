import { serve } from "@hono/node-server";
import { createLogger, loadConfig, summarizeConfig } from "@mirrorsync/runtime";
import { createServer } from "./app";

async function main() {
  const cfg = await loadConfig();
  const log = createLogger({ name: "server", ...cfg.logs });
  const pretty = cfg.logs.pretty ? 2 : 0;

  log.info(`Node ${process.version} starting...`);
  log.info(`config: ${JSON.stringify(summarizeConfig(cfg), null, pretty)}`);

  const { app, runtime } = createServer(cfg, { logger: log });
  const http = serve({ fetch: app.fetch, hostname: cfg.server.host, port: cfg.server.port }, (info) =>
    log.info("listening", { host: cfg.server.host, port: info.port })
  );

  const periodMs = Math.max(1, Math.round(1000 / cfg.replication.tickHz));
  const timer = setInterval(() => {
    runtime.scheduler.tick(Date.now());
  }, periodMs);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`signal ${signal}, shutting down...`);
    clearInterval(timer);
    http.close((e) => {
      if (e) log.error("http close failed", { error: String(e) });
      process.exit(e ? 1 : 0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("[server] fatal:", err);
  process.exit(1);
});
