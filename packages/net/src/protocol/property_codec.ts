import { z } from "zod";
import {
  err,
  ok,
  PROPERTY_TYPES,
  type Color,
  type JsonValue,
  type PropertyType,
  type PropertyValue,
  type Quat,
  type Result,
  type Rotator,
  type Transform,
  type Vec3,
} from "@mirrorsync/core";

// {"type": TypeName, "value": json}
export interface WireProperty {
  type: PropertyType;
  value: JsonValue;
}

export type CodecAnomalyKind = "heuristic" | "extra_keys" | "legacy_tag";

export interface CodecAnomaly {
  kind: CodecAnomalyKind;
  inferred: PropertyType;
  detail: string;
}

export interface DecodeOptions {
  onAnomaly?: (a: CodecAnomaly) => void;
}

// ---------- схемы ----------

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const num = z.number();
const Vec3Schema = z.object({ x: num, y: num, z: num });
const RotatorSchema = z.object({ pitch: num, yaw: num, roll: num });
const QuatSchema = z.object({ x: num, y: num, z: num, w: num });
const ColorSchema = z.object({ r: num, g: num, b: num, a: num });
const TransformSchema = z.object({ position: Vec3Schema, rotation: QuatSchema, scale: Vec3Schema });

const Int64Wire = z
  .union([z.number().int().refine(Number.isSafeInteger, "unsafe integer"), z.string().regex(/^-?\d+$/)])
  .transform((v) => BigInt(v));
const UInt64Wire = z
  .union([z.number().int().nonnegative().refine(Number.isSafeInteger, "unsafe integer"), z.string().regex(/^\d+$/)])
  .transform((v) => BigInt(v));

const KNOWN_KEYS: Partial<Record<PropertyType, ReadonlyArray<string>>> = {
  Vector: ["x", "y", "z"],
  Rotator: ["pitch", "yaw", "roll"],
  Quat: ["x", "y", "z", "w"],
  Color: ["r", "g", "b", "a"],
  Transform: ["position", "rotation", "scale"],
};

type Decoded = Result<PropertyValue>;

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  tag: PropertyType,
  build: (v: T) => PropertyValue
): Decoded {
  const r = schema.safeParse(raw);
  if (!r.success) {
    const msg = r.error.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
    return err("SerializationError", `invalid ${tag}: ${msg}`);
  }
  return ok(build(r.data));
}

const TAGGED: Record<PropertyType, (raw: unknown) => Decoded> = {
  Bool: (raw) => parseWith(z.boolean(), raw, "Bool", (value) => ({ type: "Bool", value })),
  Byte: (raw) => parseWith(z.number().int(), raw, "Byte", (value) => ({ type: "Byte", value })),
  Int32: (raw) => parseWith(z.number().int(), raw, "Int32", (value) => ({ type: "Int32", value })),
  Int64: (raw) => parseWith(Int64Wire, raw, "Int64", (value) => ({ type: "Int64", value })),
  UInt32: (raw) => parseWith(z.number().int(), raw, "UInt32", (value) => ({ type: "UInt32", value })),
  UInt64: (raw) => parseWith(UInt64Wire, raw, "UInt64", (value) => ({ type: "UInt64", value })),
  Float: (raw) => parseWith(num, raw, "Float", (value) => ({ type: "Float", value })),
  Double: (raw) => parseWith(num, raw, "Double", (value) => ({ type: "Double", value })),
  String: (raw) => parseWith(z.string(), raw, "String", (value) => ({ type: "String", value })),
  Vector: (raw) => parseWith(Vec3Schema, raw, "Vector", (value) => ({ type: "Vector", value })),
  Rotator: (raw) => parseWith(RotatorSchema, raw, "Rotator", (value) => ({ type: "Rotator", value })),
  Quat: (raw) => parseWith(QuatSchema, raw, "Quat", (value) => ({ type: "Quat", value })),
  Transform: (raw) => parseWith(TransformSchema, raw, "Transform", (value) => ({ type: "Transform", value })),
  Color: (raw) => parseWith(ColorSchema, raw, "Color", (value) => ({ type: "Color", value })),
  ObjectReference: (raw) =>
    parseWith(UInt64Wire, raw, "ObjectReference", (value) => ({ type: "ObjectReference", value })),
  ClassReference: (raw) =>
    parseWith(z.string(), raw, "ClassReference", (value) => ({ type: "ClassReference", value })),
  Array: (raw) => parseWith(JsonValueSchema, raw, "Array", (value) => ({ type: "Array", value })),
  Map: (raw) => parseWith(JsonValueSchema, raw, "Map", (value) => ({ type: "Map", value })),
  Set: (raw) => parseWith(JsonValueSchema, raw, "Set", (value) => ({ type: "Set", value })),
  Name: (raw) => parseWith(z.string(), raw, "Name", (value) => ({ type: "Name", value })),
  Text: (raw) => parseWith(z.string(), raw, "Text", (value) => ({ type: "Text", value })),
  Custom: (raw) => parseWith(JsonValueSchema, raw, "Custom", (value) => ({ type: "Custom", value })),
  None: (raw) => parseWith(z.null(), raw, "None", () => ({ type: "None", value: null })),
};

// ---------- encode ----------

function bigintToJson(v: bigint): JsonValue {
  const n = Number(v);
  return Number.isSafeInteger(n) && BigInt(n) === v ? n : v.toString();
}

const vec = (v: Vec3): JsonValue => ({ x: v.x, y: v.y, z: v.z });
const quat = (q: Quat): JsonValue => ({ x: q.x, y: q.y, z: q.z, w: q.w });
const rot = (r: Rotator): JsonValue => ({ pitch: r.pitch, yaw: r.yaw, roll: r.roll });
const color = (c: Color): JsonValue => ({ r: c.r, g: c.g, b: c.b, a: c.a });
const transform = (t: Transform): JsonValue => ({
  position: vec(t.position),
  rotation: quat(t.rotation),
  scale: vec(t.scale),
});

export function encodeProperty(v: PropertyValue): WireProperty {
  switch (v.type) {
    case "Int64":
    case "ObjectReference":
      return { type: v.type, value: bigintToJson(v.value) };
    case "UInt64":
      return { type: v.type, value: v.value.toString() };
    case "Vector":
      return { type: v.type, value: vec(v.value) };
    case "Rotator":
      return { type: v.type, value: rot(v.value) };
    case "Quat":
      return { type: v.type, value: quat(v.value) };
    case "Transform":
      return { type: v.type, value: transform(v.value) };
    case "Color":
      return { type: v.type, value: color(v.value) };
    default:
      return { type: v.type, value: v.value };
  }
}

export function serializeProperty(v: PropertyValue): string {
  return JSON.stringify(encodeProperty(v));
}

// ---------- decode ----------

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isPropertyType(s: string): s is PropertyType {
  return PROPERTY_TYPES.some((t) => t === s);
}

function reportExtraKeys(v: PropertyValue, raw: unknown, opts: DecodeOptions) {
  const known = KNOWN_KEYS[v.type];
  if (!known || !isRecord(raw)) return;
  const extra = Object.keys(raw).filter((k) => !known.includes(k));
  if (v.type === "Transform") {
    for (const part of ["position", "rotation", "scale"] as const) {
      const sub = raw[part];
      const subKnown = part === "rotation" ? KNOWN_KEYS.Quat : KNOWN_KEYS.Vector;
      if (isRecord(sub) && subKnown) {
        for (const k of Object.keys(sub)) if (!subKnown.includes(k)) extra.push(`${part}.${k}`);
      }
    }
  }
  if (extra.length) {
    opts.onAnomaly?.({ kind: "extra_keys", inferred: v.type, detail: `unexpected keys: ${extra.join(", ")}` });
  }
}

/**
Структурный разбор без тега (старые клиенты). Хрупкая эвристика:
x/y/z -> Vector, +w -> Quat, pitch/yaw/roll -> Rotator, r/g/b -> Color,
location|position + rotation + scale -> Transform. Каждое срабатывание
отдаётся в onAnomaly. */
function decodeUntagged(raw: unknown, opts: DecodeOptions): Decoded {
  const infer = (v: PropertyValue, detail: string): Decoded => {
    opts.onAnomaly?.({ kind: "heuristic", inferred: v.type, detail });
    return ok(v);
  };

  if (raw === null) return ok({ type: "None", value: null });
  if (typeof raw === "boolean") return ok({ type: "Bool", value: raw });
  if (typeof raw === "string") return ok({ type: "String", value: raw });
  if (typeof raw === "number") {
    if (Number.isInteger(raw)) {
      if (raw >= -0x8000_0000 && raw <= 0x7fff_ffff) return ok({ type: "Int32", value: raw });
      if (Number.isSafeInteger(raw)) return ok({ type: "Int64", value: BigInt(raw) });
    }
    return ok({ type: "Double", value: raw });
  }
  if (Array.isArray(raw)) {
    const r = JsonValueSchema.safeParse(raw);
    return r.success ? ok({ type: "Array", value: r.data }) : err("SerializationError", "invalid array payload");
  }
  if (!isRecord(raw)) return err("SerializationError", "unsupported payload");

  const has = (...keys: string[]) => keys.every((k) => k in raw);

  if (has("x", "y", "z")) {
    if (has("w")) {
      const r = TAGGED.Quat(raw);
      return r.ok ? infer(r.data, "x/y/z/w fields") : r;
    }
    const r = TAGGED.Vector(raw);
    return r.ok ? infer(r.data, "x/y/z fields") : r;
  }
  if (has("pitch", "yaw", "roll")) {
    const r = TAGGED.Rotator(raw);
    return r.ok ? infer(r.data, "pitch/yaw/roll fields") : r;
  }
  if (has("r", "g", "b")) {
    const r = TAGGED.Color({ a: 255, ...raw });
    return r.ok ? infer(r.data, "r/g/b fields") : r;
  }
  if ((has("location") || has("position")) && has("rotation", "scale")) {
    const r = TAGGED.Transform({
      position: raw.position ?? raw.location,
      rotation: raw.rotation,
      scale: raw.scale,
    });
    return r.ok ? infer(r.data, "location/rotation/scale fields") : r;
  }
  const r = JsonValueSchema.safeParse(raw);
  return r.success
    ? infer({ type: "Custom", value: r.data }, "unrecognized object shape")
    : err("SerializationError", "invalid object payload");
}

export function decodeProperty(raw: unknown, opts: DecodeOptions = {}): Decoded {
  const tag = isRecord(raw) ? raw.type : undefined;
  if (isRecord(raw) && typeof tag === "string") {
    if (!isPropertyType(tag)) return err("SerializationError", `unknown type tag: ${tag}`);
    if ("value" in raw) {
      const r = TAGGED[tag](raw.value);
      if (r.ok) reportExtraKeys(r.data, raw.value, opts);
      return r;
    }
    // старая форма: {"type":"ObjectReference","id":..}, {"type":"ClassReference","name":..}
    const legacy = tag === "ObjectReference" ? raw.id : tag === "ClassReference" ? raw.name : undefined;
    if (legacy !== undefined) {
      const r = TAGGED[tag](legacy);
      if (r.ok) opts.onAnomaly?.({ kind: "legacy_tag", inferred: tag, detail: "value carried outside `value`" });
      return r;
    }
    return err("SerializationError", `${tag} payload has no value`);
  }
  return decodeUntagged(raw, opts);
}

export function deserializeProperty(json: string, opts: DecodeOptions = {}): Decoded {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    return err("SerializationError", `invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return decodeProperty(raw, opts);
}
