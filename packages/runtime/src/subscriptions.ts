import { err, ok, type ClientId, type ReplicationBatch, type Result } from "@mirrorsync/core";
import {
  batchToTableUpdates,
  SubscriptionMessageSchema,
  TABLE_OBJECTS,
  TABLE_PROPERTIES,
  type SubscriptionMessage,
  type TableUpdate,
} from "@mirrorsync/net";

export const KNOWN_TABLES: ReadonlySet<string> = new Set([TABLE_OBJECTS, TABLE_PROPERTIES]);

// клиент -> таблицы, на которые он подписан
export class SubscriptionRegistry {
  private subs = new Map<ClientId, Set<string>>();

  constructor(private readonly tables: ReadonlySet<string> = KNOWN_TABLES) {}

  apply(msg: SubscriptionMessage): Result<ReadonlySet<string>> {
    if (!this.tables.has(msg.table)) return err("NotFound", `unknown table ${msg.table}`);
    let set = this.subs.get(msg.client_id);
    if (msg.type === "subscribe") {
      if (!set) this.subs.set(msg.client_id, (set = new Set()));
      set.add(msg.table);
    } else if (set) {
      set.delete(msg.table);
      if (set.size === 0) this.subs.delete(msg.client_id);
    }
    return ok(this.tablesFor(msg.client_id));
  }

  // сырое сообщение с провода
  applyRaw(raw: unknown): Result<ReadonlySet<string>> {
    const parsed = SubscriptionMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      return err("SerializationError", `invalid subscription message: ${issues}`);
    }
    return this.apply(parsed.data);
  }

  subscribeAll(client: ClientId) {
    this.subs.set(client, new Set(this.tables));
  }

  tablesFor(client: ClientId): ReadonlySet<string> {
    return this.subs.get(client) ?? new Set<string>();
  }

  removeClient(client: ClientId) {
    this.subs.delete(client);
  }

  render(batch: ReplicationBatch): TableUpdate[] {
    return batchToTableUpdates(batch, this.tablesFor(batch.clientId));
  }
}
