import type { ClassId, ClientId, ObjectId } from "./id";

// Геометрия
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Rotator {
  pitch: number;
  yaw: number;
  roll: number;
}

export interface Quat {
  x: number;
  y: number;
  z: number;
  w: number;
}

export interface Transform {
  position: Vec3;
  rotation: Quat;
  scale: Vec3;
}

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const PROPERTY_TYPES = [
  "Bool",
  "Byte",
  "Int32",
  "Int64",
  "UInt32",
  "UInt64",
  "Float",
  "Double",
  "String",
  "Vector",
  "Rotator",
  "Quat",
  "Transform",
  "Color",
  "ObjectReference",
  "ClassReference",
  "Array",
  "Map",
  "Set",
  "Name",
  "Text",
  "Custom",
  "None",
] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

// тег на проводе совпадает с тегом в памяти
export type PropertyValue =
  | { type: "Bool"; value: boolean }
  | { type: "Byte"; value: number }
  | { type: "Int32"; value: number }
  | { type: "Int64"; value: bigint }
  | { type: "UInt32"; value: number }
  | { type: "UInt64"; value: bigint }
  | { type: "Float"; value: number }
  | { type: "Double"; value: number }
  | { type: "String"; value: string }
  | { type: "Vector"; value: Vec3 }
  | { type: "Rotator"; value: Rotator }
  | { type: "Quat"; value: Quat }
  | { type: "Transform"; value: Transform }
  | { type: "Color"; value: Color }
  | { type: "ObjectReference"; value: ObjectId }
  | { type: "ClassReference"; value: string }
  | { type: "Array"; value: JsonValue }
  | { type: "Map"; value: JsonValue }
  | { type: "Set"; value: JsonValue }
  | { type: "Name"; value: string }
  | { type: "Text"; value: string }
  | { type: "Custom"; value: JsonValue }
  | { type: "None"; value: null };

export type PropertyValueOf<T extends PropertyType> = Extract<PropertyValue, { type: T }>;

export const PV = {
  bool: (value: boolean): PropertyValue => ({ type: "Bool", value }),
  int32: (value: number): PropertyValue => ({ type: "Int32", value }),
  float: (value: number): PropertyValue => ({ type: "Float", value }),
  double: (value: number): PropertyValue => ({ type: "Double", value }),
  string: (value: string): PropertyValue => ({ type: "String", value }),
  vector: (x: number, y: number, z: number): PropertyValue => ({ type: "Vector", value: { x, y, z } }),
  rotator: (pitch: number, yaw: number, roll: number): PropertyValue => ({
    type: "Rotator",
    value: { pitch, yaw, roll },
  }),
  objectRef: (value: ObjectId): PropertyValue => ({ type: "ObjectReference", value }),
  none: (): PropertyValue => ({ type: "None", value: null }),
};

export type ReplicationCondition =
  | "Always"
  | "OnChange"
  | "Initial"
  | "OwnerOnly"
  | "ServerOnly"
  | "Custom";

export interface PropertyConstraint {
  min?: number;
  max?: number;
  allowed?: ReadonlyArray<string | number>;
  required?: boolean;
}

export interface PropertyDefinition {
  className: string;
  name: string;
  type: PropertyType;
  replicated: boolean;
  condition: ReplicationCondition;
  readonly: boolean;
  flags: number;
  constraint?: PropertyConstraint;
}

export interface ClassDefinition {
  classId: ClassId;
  name: string;
  parentId?: ClassId;
  replicates: boolean;
}

export type LifecycleState =
  | "Initializing"
  | "Active"
  | "PendingKill"
  | "PendingDestroy"
  | "Destroyed";

export interface ObjectInstance {
  objectId: ObjectId;
  classId: ClassId;
  className: string;
  ownerId?: ClientId;
  state: LifecycleState;
  createdAt: number;
  destroyedAt?: number;
}

export type RelevancyLevel =
  | "AlwaysRelevant"
  | "OwnerOnly"
  | "DistanceBased"
  | "SameZone"
  | "Custom"
  | "NeverRelevant";

export type UpdateFrequency =
  | "High"
  | "Medium"
  | "Low"
  | "OnDemand";

export type NetworkPriority =
  | "Critical"
  | "High"
  | "Normal"
  | "Low";

// меньше = важнее (для сортировки пакетов)
export const PRIORITY_RANK: Record<NetworkPriority, number> = {
  Critical: 0,
  High: 1,
  Normal: 2,
  Low: 3,
};

export interface RelevancySettings {
  level: RelevancyLevel;
  frequency: UpdateFrequency;
  priority: NetworkPriority;
  maxDistance?: number;
}

export interface PendingReplication {
  objectId: ObjectId;
  propertyName: string;
  timestamp: number;
  highPriority: boolean;
}

export interface ObjectStateSnapshot {
  objectId: ObjectId;
  classId: ClassId;
  className: string;
  properties: Map<string, PropertyValue>;
  isNew: boolean;
  priority: NetworkPriority;
}

export function vecDistanceSq(a: Vec3, b: Vec3): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return dx * dx + dy * dy + dz * dz;
}

export const IDENTITY_QUAT: Quat = { x: 0, y: 0, z: 0, w: 1 };
export const ZERO_VEC: Vec3 = { x: 0, y: 0, z: 0 };
export const ONE_VEC: Vec3 = { x: 1, y: 1, z: 1 };

// всё, что уходит одному клиенту за один тик
export interface ReplicationBatch {
  clientId: ClientId;
  tick: number;
  snapshots: ObjectStateSnapshot[];
  tombstones: ObjectId[];
}

// кто вызывает операцию авторитета
export interface Caller {
  clientId: ClientId;
  admin: boolean;
}
