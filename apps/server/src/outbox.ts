import type { ClientId, ReplicationBatch } from "@mirrorsync/core";
import type { TableUpdate } from "@mirrorsync/net";
import { silentLogger, type Logger, type SubscriptionRegistry } from "@mirrorsync/runtime";

export interface OutboxEnvelope {
  tick: number;
  updates: TableUpdate[];
}

/**
Очередь исходящих table_update на клиента для опроса через REST.
Рендер по подпискам в момент тика; при переполнении отбрасываются старые. */
export class Outbox {
  private queues = new Map<ClientId, OutboxEnvelope[]>();
  private dropped = 0;

  constructor(
    private readonly subscriptions: SubscriptionRegistry,
    private readonly limit = 256,
    private readonly log: Logger = silentLogger
  ) {}

  push(batch: ReplicationBatch) {
    const updates = this.subscriptions.render(batch);
    if (updates.length === 0) return;
    let q = this.queues.get(batch.clientId);
    if (!q) this.queues.set(batch.clientId, (q = []));
    q.push({ tick: batch.tick, updates });
    if (q.length > this.limit) {
      q.shift();
      this.dropped++;
      this.log.warn("outbox overflow, oldest envelope dropped", { clientId: batch.clientId, limit: this.limit });
    }
  }

  drain(client: ClientId): OutboxEnvelope[] {
    const q = this.queues.get(client) ?? [];
    this.queues.delete(client);
    return q;
  }

  pending(client: ClientId): number {
    return this.queues.get(client)?.length ?? 0;
  }

  forget(client: ClientId) {
    this.queues.delete(client);
  }

  droppedTotal() {
    return this.dropped;
  }
}
