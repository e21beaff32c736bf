import { err, ok, type Result } from "./errors";
import { U64_MASK } from "./id";
import type { PropertyDefinition, PropertyValue, Quat, Vec3 } from "./types";

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;
const UINT32_MAX = 0xffff_ffff;
const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

function finite(...xs: number[]) {
  return xs.every((x) => Number.isFinite(x));
}

function intIn(x: number, min: number, max: number) {
  return Number.isInteger(x) && x >= min && x <= max;
}

const vecOk = (v: Vec3) => finite(v.x, v.y, v.z);
const quatOk = (q: Quat) => finite(q.x, q.y, q.z, q.w);

/** Проверка диапазонов и конечности самого значения, без учёта определения. */
export function checkValueShape(v: PropertyValue): Result<PropertyValue> {
  const bad = (msg: string) => err<PropertyValue>("ValidationFailed", msg);
  switch (v.type) {
    case "Byte":
      return intIn(v.value, 0, 255) ? ok(v) : bad(`Byte out of range: ${v.value}`);
    case "Int32":
      return intIn(v.value, INT32_MIN, INT32_MAX) ? ok(v) : bad(`Int32 out of range: ${v.value}`);
    case "UInt32":
      return intIn(v.value, 0, UINT32_MAX) ? ok(v) : bad(`UInt32 out of range: ${v.value}`);
    case "Int64":
      return v.value >= INT64_MIN && v.value <= INT64_MAX ? ok(v) : bad("Int64 out of range");
    case "UInt64":
    case "ObjectReference":
      return v.value >= 0n && v.value <= U64_MASK ? ok(v) : bad(`${v.type} out of range`);
    case "Float":
    case "Double":
      return finite(v.value) ? ok(v) : bad(`${v.type} must be finite`);
    case "Vector":
      return vecOk(v.value) ? ok(v) : bad("Vector components must be finite");
    case "Rotator":
      return finite(v.value.pitch, v.value.yaw, v.value.roll) ? ok(v) : bad("Rotator components must be finite");
    case "Quat":
      return quatOk(v.value) ? ok(v) : bad("Quat components must be finite");
    case "Transform": {
      const t = v.value;
      return vecOk(t.position) && quatOk(t.rotation) && vecOk(t.scale)
        ? ok(v)
        : bad("Transform components must be finite");
    }
    case "Color": {
      const c = v.value;
      return [c.r, c.g, c.b, c.a].every((ch) => intIn(ch, 0, 255))
        ? ok(v)
        : bad("Color channels must be integers in 0..255");
    }
    default:
      return ok(v);
  }
}

function scalarOf(v: PropertyValue): number | string | undefined {
  switch (v.type) {
    case "Byte":
    case "Int32":
    case "UInt32":
    case "Float":
    case "Double":
      return v.value;
    case "Int64":
    case "UInt64":
      return Number(v.value);
    case "String":
    case "Name":
    case "Text":
    case "ClassReference":
      return v.value;
    default:
      return undefined;
  }
}

/**
Проверяет значение против определения свойства.
None допускается для любого типа, кроме required. */
export function validateProperty(def: PropertyDefinition, v: PropertyValue): Result<PropertyValue> {
  const c = def.constraint;
  if (v.type === "None") {
    return c?.required
      ? err("ValidationFailed", `${def.className}.${def.name} is required`)
      : ok(v);
  }
  if (v.type !== def.type) {
    return err("TypeMismatch", `${def.className}.${def.name} expects ${def.type}, got ${v.type}`);
  }
  const shape = checkValueShape(v);
  if (!shape.ok) {
    return err("ValidationFailed", `${def.className}.${def.name}: ${shape.error.message}`);
  }
  if (!c) return ok(v);

  const s = scalarOf(v);
  if (c.required && s === "") {
    return err("ValidationFailed", `${def.className}.${def.name} is required`);
  }
  if (typeof s === "number") {
    if (c.min != null && s < c.min) return err("ValidationFailed", `${def.className}.${def.name} < ${c.min}`);
    if (c.max != null && s > c.max) return err("ValidationFailed", `${def.className}.${def.name} > ${c.max}`);
  }
  if (c.allowed && s !== undefined && !c.allowed.includes(s)) {
    return err("ValidationFailed", `${def.className}.${def.name} value not allowed`);
  }
  return ok(v);
}
