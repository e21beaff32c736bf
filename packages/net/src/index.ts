export const pkg = "@mirrorsync/net";
export type NetVersion = "0.1.0";
export const version: NetVersion = "0.1.0";

export {
  encodeProperty,
  serializeProperty,
  decodeProperty,
  deserializeProperty,
  JsonValueSchema,
} from "./protocol/property_codec";
export type { WireProperty, CodecAnomaly, CodecAnomalyKind, DecodeOptions } from "./protocol/property_codec";
export {
  SpawnRequestSchema,
  SpawnResponseSchema,
  TableUpdateSchema,
  TableOpSchema,
  SubscriptionMessageSchema,
  TABLE_OBJECTS,
  TABLE_PROPERTIES,
  batchToTableUpdates,
  encodeSpawnResponse,
  decodeSpawnResponse,
  subscriptionMessage,
  idToJson,
} from "./protocol/messages";
export type { SpawnRequest, SpawnResponse, TableOp, TableUpdate, SubscriptionMessage } from "./protocol/messages";
