import { z } from "zod";
import {
  parseObjectId,
  type ClientId,
  type JsonValue,
  type ObjectId,
  type ReplicationBatch,
} from "@mirrorsync/core";
import { encodeProperty, JsonValueSchema } from "./property_codec";

const f32 = z.number().finite();

const IdWire = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]).transform((v, ctx) => {
  const id = parseObjectId(v);
  if (id == null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid id" });
    return z.NEVER;
  }
  return id;
});

// ---------- spawn ----------

export const SpawnRequestSchema = z.object({
  class_id: z.number().int().nonnegative().max(0xffff_ffff),
  actor_name: z.string(),
  position: z.tuple([f32, f32, f32]),
  rotation: z.tuple([f32, f32, f32, f32]), // xyzw
  scale: z.tuple([f32, f32, f32]),
  initial_properties: z.array(z.tuple([z.string().min(1), z.string()])).default([]),
});

export type SpawnRequest = z.infer<typeof SpawnRequestSchema>;

export interface SpawnResponse {
  objectId: ObjectId; // 0 = ошибка
  error?: string;
}

export const SpawnResponseSchema = z.object({
  object_id: IdWire,
  error: z.string().optional(),
});

export function idToJson(id: bigint): number | string {
  const n = Number(id);
  return Number.isSafeInteger(n) ? n : id.toString();
}

export function encodeSpawnResponse(r: SpawnResponse): { object_id: number | string; error?: string } {
  return { object_id: idToJson(r.objectId), ...(r.error != null ? { error: r.error } : {}) };
}

export function decodeSpawnResponse(raw: unknown): SpawnResponse | null {
  const r = SpawnResponseSchema.safeParse(raw);
  if (!r.success) return null;
  return { objectId: r.data.object_id, ...(r.data.error != null ? { error: r.data.error } : {}) };
}

// ---------- table_update / subscribe ----------

export const TableOpSchema = z.enum(["insert", "update", "delete"]);
export type TableOp = z.infer<typeof TableOpSchema>;

export const TableUpdateSchema = z.object({
  type: z.literal("table_update"),
  table: z.string().min(1),
  operations: z.array(z.object({ op: TableOpSchema, row: z.record(JsonValueSchema) })),
});
export type TableUpdate = z.infer<typeof TableUpdateSchema>;

export const SubscriptionMessageSchema = z.object({
  type: z.enum(["subscribe", "unsubscribe"]),
  table: z.string().min(1),
  client_id: IdWire,
});
export type SubscriptionMessage = z.infer<typeof SubscriptionMessageSchema>;

export const TABLE_OBJECTS = "objects";
export const TABLE_PROPERTIES = "object_properties";

/**
Раскладывает пакет тика в table_update по таблицам.
objects: insert для новых, delete для tombstone.
object_properties: insert для полного снимка, update для дельты.
Пустые таблицы и таблицы без подписки не попадают в результат. */
export function batchToTableUpdates(batch: ReplicationBatch, tables: ReadonlySet<string>): TableUpdate[] {
  const objects: TableUpdate["operations"] = [];
  const props: TableUpdate["operations"] = [];

  for (const s of batch.snapshots) {
    const oid = idToJson(s.objectId);
    if (s.isNew) {
      objects.push({
        op: "insert",
        row: { object_id: oid, class_id: s.classId, class_name: s.className, priority: s.priority },
      });
    }
    for (const [name, value] of s.properties) {
      const wire = encodeProperty(value);
      const row: Record<string, JsonValue> = { object_id: oid, name, value: { type: wire.type, value: wire.value } };
      props.push({ op: s.isNew ? "insert" : "update", row });
    }
  }
  for (const id of batch.tombstones) {
    objects.push({ op: "delete", row: { object_id: idToJson(id) } });
  }

  const out: TableUpdate[] = [];
  if (tables.has(TABLE_OBJECTS) && objects.length) {
    out.push({ type: "table_update", table: TABLE_OBJECTS, operations: objects });
  }
  if (tables.has(TABLE_PROPERTIES) && props.length) {
    out.push({ type: "table_update", table: TABLE_PROPERTIES, operations: props });
  }
  return out;
}

export function subscriptionMessage(type: "subscribe" | "unsubscribe", table: string, clientId: ClientId) {
  return { type, table, client_id: idToJson(clientId) };
}
