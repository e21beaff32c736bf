import {
  isAlive,
  PRIORITY_RANK,
  type ClientId,
  type ObjectId,
  type ObjectStateSnapshot,
  type ReplicationBatch,
} from "@mirrorsync/core";
import type { AuthorityContext } from "./authority/context";
import { silentLogger, type Logger } from "./logger";

export type ReplicationSink = (batch: ReplicationBatch) => void;

export interface SchedulerOptions {
  tombstoneRetentionMs: number;
  logger?: Logger;
}

export interface TickReport {
  tick: number;
  drained: number;
  destroyed: number;
  purged: number;
  batches: number;
  snapshots: number;
}

// приоритет объекта, затем срочные записи этого тика, затем id
function sendOrder(urgent: ReadonlySet<ObjectId>) {
  return (a: ObjectStateSnapshot, b: ObjectStateSnapshot) => {
    const p = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
    if (p !== 0) return p;
    const u = Number(urgent.has(b.objectId)) - Number(urgent.has(a.objectId));
    if (u !== 0) return u;
    return a.objectId < b.objectId ? -1 : a.objectId > b.objectId ? 1 : 0;
  };
}

const byId = (a: ObjectId, b: ObjectId) => (a < b ? -1 : a > b ? 1 : 0);
const NOTHING: ReadonlySet<ObjectId> = new Set();

/**
Один тик репликации как неделимая единица работы. Вызывается снаружи
(таймер, тест, симуляция); повторный вход во время тика отклоняется. */
export class ReplicationScheduler {
  private running = false;
  // что каждый клиент уже получил полным снимком
  private replicated = new Map<ClientId, Set<ObjectId>>();
  private readonly log: Logger;

  constructor(
    private readonly ctx: AuthorityContext,
    private readonly sink: ReplicationSink,
    private readonly opts: SchedulerOptions
  ) {
    this.log = opts.logger ?? silentLogger;
    ctx.onClientDisconnected.on((client) => {
      this.replicated.delete(client);
    });
    ctx.onObjectPurged.on((id) => {
      for (const set of this.replicated.values()) set.delete(id);
    });
  }

  isRunning() {
    return this.running;
  }

  hasReplicated(client: ClientId, object: ObjectId): boolean {
    return this.replicated.get(client)?.has(object) ?? false;
  }

  tick(now: number): TickReport | null {
    if (this.running) {
      this.log.warn("tick refused: previous tick still running", { now });
      return null;
    }
    this.running = true;
    try {
      return this.runTick(now);
    } finally {
      this.running = false;
    }
  }

  private runTick(now: number): TickReport {
    const { ctx } = this;
    const { engine, tracker, builder } = ctx;

    // срочность влияет только на порядок отправки, не на частоту
    const pending = ctx.queue.drain();
    const urgent = new Set<ObjectId>();
    for (const e of pending) if (e.highPriority) urgent.add(e.objectId);
    const order = sendOrder(urgent);

    const sweep = ctx.sweepLifecycle(now, this.opts.tombstoneRetentionMs);
    const tick = engine.refresh();
    // объекты без своих настроек идут по policy.missingSettings
    const unsettled = ctx.liveObjects().filter((o) => !engine.hasSettings(o.objectId));

    let batches = 0;
    let snapshots = 0;
    for (const client of ctx.clients()) {
      const view = engine.relevanceFor(client);
      const sent = this.replicated.get(client) ?? new Set<ObjectId>();
      this.replicated.set(client, sent);

      const out: ObjectStateSnapshot[] = [];
      const included = new Set<ObjectId>();
      const addFull = (id: ObjectId) => {
        if (included.has(id) || sent.has(id)) return;
        const obj = ctx.objects.get(id);
        if (!obj || !isAlive(obj.state)) return;
        const snap = builder.buildFullSnapshot(client, id);
        if (!snap) return;
        out.push(snap);
        included.add(id);
      };

      for (const s of builder.buildSnapshotsForClient(client, view)) {
        // дельта для объекта, которого у клиента нет, превращается в полный снимок
        if (!s.isNew && !sent.has(s.objectId)) {
          addFull(s.objectId);
          continue;
        }
        out.push(s);
        included.add(s.objectId);
      }

      // первая доставка: due-объекты из кэша релевантности и объекты без настроек
      for (const id of engine.relevantSet(client) ?? NOTHING) addFull(id);
      for (const obj of unsettled) if (view.has(obj.objectId)) addFull(obj.objectId);

      const tombstones: ObjectId[] = [];
      for (const id of sent) {
        const obj = ctx.objects.get(id);
        if (!obj || !isAlive(obj.state)) {
          tombstones.push(id);
        } else if (!included.has(id) && !view.has(id) && engine.isDue(id)) {
          // вышел из релевантности: при возвращении придёт полный снимок
          sent.delete(id);
        }
      }
      tombstones.sort(byId);
      out.sort(order);

      if (out.length === 0 && tombstones.length === 0) continue;
      const batch: ReplicationBatch = { clientId: client, tick, snapshots: out, tombstones };
      try {
        this.sink(batch);
      } catch (e) {
        // надгробия остаются в sent до следующей попытки, объекты пакета уйдут полным снимком
        for (const s of out) sent.delete(s.objectId);
        this.log.error("replication sink failed", { clientId: client, tick, error: String(e) });
        continue;
      }
      for (const s of out) sent.add(s.objectId);
      for (const id of tombstones) sent.delete(id);
      batches++;
      snapshots += out.length;
    }

    tracker.flush((id) => {
      const obj = ctx.objects.get(id);
      return obj != null && isAlive(obj.state) && !engine.isDue(id);
    });

    return {
      tick,
      drained: pending.length,
      destroyed: sweep.destroyed.length,
      purged: sweep.purged.length,
      batches,
      snapshots,
    };
  }
}
