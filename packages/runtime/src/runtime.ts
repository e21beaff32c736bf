import { AuthorityContext } from "./authority/context";
import type { Config } from "./config/schema";
import { createLogger, type Logger } from "./logger";
import { ReplicationScheduler, type ReplicationSink } from "./scheduler";
import { SubscriptionRegistry } from "./subscriptions";

export interface Runtime {
  cfg: Config;
  log: Logger;
  authority: AuthorityContext;
  scheduler: ReplicationScheduler;
  subscriptions: SubscriptionRegistry;
}

export interface RuntimeOptions {
  sink?: ReplicationSink;
  subscriptions?: SubscriptionRegistry;
  logger?: Logger;
  clock?: () => number;
}

// один авторитет с планировщиком, собранный из конфигурации
export function createRuntime(cfg: Config, opt: RuntimeOptions = {}): Runtime {
  const log = opt.logger ?? createLogger({ name: "mirrorsync", ...cfg.logs });
  const subscriptions = opt.subscriptions ?? new SubscriptionRegistry();
  const authority = new AuthorityContext({
    firstObjectId: BigInt(cfg.replication.firstObjectId),
    firstClassId: cfg.replication.firstClassId,
    cellSize: cfg.relevancy.cellSize,
    policy: {
      missingSettings: cfg.relevancy.missingSettings,
      unknownClientSeesAll: cfg.relevancy.unknownClientSeesAll,
      defaultMaxDistance: cfg.relevancy.defaultMaxDistance,
    },
    logger: log.child("authority"),
    ...(opt.clock ? { clock: opt.clock } : {}),
  });
  authority.onClientDisconnected.on((client) => subscriptions.removeClient(client));

  const sink: ReplicationSink =
    opt.sink ??
    ((batch) => {
      const updates = subscriptions.render(batch);
      if (updates.length) log.debug("table updates", { clientId: batch.clientId, tables: updates.length });
    });
  const scheduler = new ReplicationScheduler(authority, sink, {
    tombstoneRetentionMs: cfg.replication.tombstoneRetentionMs,
    logger: log.child("scheduler"),
  });
  return { cfg, log, authority, scheduler, subscriptions };
}
