import {
  CallbackRegistry,
  ClassRegistry,
  EventBus,
  isTemporaryId,
  makeTemporaryId,
  ObjectIdAllocator,
  ObjectRegistry,
  parseObjectId,
  PropertyStore,
  PV,
  TEMP_ID_BIT,
  validateProperty,
  type PropertyDefinition,
} from "@mirrorsync/core";
import { Guarded } from "@mirrorsync/utils";

function def(over: Partial<PropertyDefinition> & Pick<PropertyDefinition, "type">): PropertyDefinition {
  return { className: "Pawn", name: "P", replicated: true, condition: "OnChange", readonly: false, flags: 0, ...over };
}

test("temporary ids carry the high bit and never collide with authority ids", () => {
  const id = makeTemporaryId({ now: () => 0x1234, random32: () => 0xabcd });
  expect(id).toBe(TEMP_ID_BIT | (0xabcdn << 32n) | 0x1234n);
  expect(isTemporaryId(id)).toBe(true);
  const alloc = new ObjectIdAllocator();
  expect(alloc.allocate()).toBe(1000n);
  expect(alloc.allocate()).toBe(1001n);
  expect(isTemporaryId(1001n)).toBe(false);
});

test("allocator never hands out reserved ids", () => {
  expect(new ObjectIdAllocator(5n).allocate()).toBe(1000n);
  expect(new ObjectIdAllocator(5000n).peek()).toBe(5000n);
});

test("parseObjectId accepts u64 forms only", () => {
  expect(parseObjectId("18446744073709551615")).toBe((1n << 64n) - 1n);
  expect(parseObjectId("18446744073709551616")).toBeNull();
  expect(parseObjectId(-1)).toBeNull();
  expect(parseObjectId(1.5)).toBeNull();
  expect(parseObjectId("42")).toBe(42n);
});

test("class registry: Actor, inheritance and shadowing", () => {
  const reg = new ClassRegistry();
  const actor = reg.getClassByName("Actor");
  expect(actor?.classId).toBe(100);
  const pawn = reg.defineClass({
    name: "Pawn",
    parent: "Actor",
    properties: [
      { name: "Health", type: "Int32" },
      { name: "Scale", type: "Float", replicated: false },
    ],
  });
  expect(pawn.ok).toBe(true);
  if (!pawn.ok) return;
  expect(pawn.data.classId).toBe(101);
  expect(reg.getProperty(pawn.data.classId, "Location")?.type).toBe("Vector");
  expect(reg.getProperty(pawn.data.classId, "Scale")?.type).toBe("Float");
  expect(reg.isA(pawn.data.classId, "Actor")).toBe(true);
  expect(reg.replicatedProperties(pawn.data.classId).map((p) => p.name)).toEqual([
    "Location",
    "Rotation",
    "ActorName",
    "Health",
  ]);
});

test("class registry errors", () => {
  const reg = new ClassRegistry();
  const dup = reg.defineClass({ name: "Actor" });
  expect(dup.ok ? null : dup.error.kind).toBe("AlreadyExists");
  const orphan = reg.defineClass({ name: "Orphan", parent: "Missing" });
  expect(orphan.ok ? null : orphan.error.kind).toBe("NotFound");
  const twice = reg.defineClass({
    name: "Twice",
    properties: [
      { name: "A", type: "Bool" },
      { name: "A", type: "Bool" },
    ],
  });
  expect(twice.ok ? null : twice.error.kind).toBe("AlreadyExists");
  expect(reg.getClassByName("Twice")).toBeUndefined();
  const again = reg.defineProperty("Actor", { name: "Location", type: "Vector" });
  expect(again.ok ? null : again.error.kind).toBe("AlreadyExists");
});

test("validateProperty: type, shape and constraints", () => {
  const health = def({ name: "Health", type: "Int32", constraint: { min: 0, max: 100 } });
  expect(validateProperty(health, PV.int32(50)).ok).toBe(true);
  const high = validateProperty(health, PV.int32(101));
  expect(high.ok ? null : high.error).toEqual({ kind: "ValidationFailed", message: "Pawn.Health > 100" });
  const wrong = validateProperty(health, PV.float(1));
  expect(wrong.ok ? null : wrong.error.kind).toBe("TypeMismatch");
  const byte = validateProperty(def({ type: "Byte" }), { type: "Byte", value: 256 });
  expect(byte.ok ? null : byte.error.message).toBe("Pawn.P: Byte out of range: 256");
  const nan = validateProperty(def({ type: "Vector" }), PV.vector(0, Number.NaN, 0));
  expect(nan.ok ? null : nan.error.kind).toBe("ValidationFailed");
  const team = def({ name: "Team", type: "String", constraint: { allowed: ["red", "blue"] } });
  expect(validateProperty(team, PV.string("red")).ok).toBe(true);
  expect(validateProperty(team, PV.string("green")).ok).toBe(false);
});

test("None passes unless the property is required", () => {
  expect(validateProperty(def({ type: "Int32" }), PV.none()).ok).toBe(true);
  const req = validateProperty(def({ type: "Int32", constraint: { required: true } }), PV.none());
  expect(req.ok ? null : req.error).toEqual({ kind: "ValidationFailed", message: "Pawn.P is required" });
});

test("object lifecycle transitions", () => {
  const objs = new ObjectRegistry();
  objs.create(1000n, 100, "Actor", 1, 7n);
  expect(objs.get(1000n)?.state).toBe("Initializing");
  expect(objs.setState(1000n, "Active", 2)).toBe(true);
  expect(objs.setState(1000n, "PendingDestroy", 3)).toBe(true);
  expect(objs.setState(1000n, "Active", 4)).toBe(false);
  expect(objs.setState(1000n, "Destroyed", 5)).toBe(true);
  expect(objs.get(1000n)?.destroyedAt).toBe(5);
  expect(objs.setState(1000n, "Active", 6)).toBe(false);
  expect(objs.ownerOf(1000n)).toBe(7n);
});

test("property store keeps values per object", () => {
  const store = new PropertyStore();
  store.set(1n, "A", PV.int32(1));
  store.setMany(1n, [
    ["B", PV.bool(true)],
    ["A", PV.int32(2)],
  ]);
  expect(store.get(1n, "A")).toEqual(PV.int32(2));
  expect(store.all(1n).size).toBe(2);
  store.deleteObject(1n);
  expect(store.has(1n, "A")).toBe(false);
  expect(store.objectCount()).toBe(0);
});

test("event bus drains in emit order", () => {
  const bus = new EventBus<number>();
  bus.emit(1);
  bus.emit(2);
  expect(bus.drain()).toEqual([1, 2]);
  expect(bus.size()).toBe(0);
  bus.emit(3);
  expect(bus.drain()).toEqual([3]);
});

test("callback registry unsubscribe", () => {
  const reg = new CallbackRegistry<[bigint, bigint]>();
  const seen: Array<[bigint, bigint]> = [];
  const off = reg.on((a, b) => seen.push([a, b]));
  reg.emit(1n, 2n);
  off();
  reg.emit(3n, 4n);
  expect(seen).toEqual([[1n, 2n]]);
  expect(reg.count()).toBe(0);
});

test("guarded refuses re-entrant access", () => {
  const g = new Guarded(new Map<string, number>(), "things");
  expect(() => g.with(() => g.with((m) => m.size))).toThrow("[guarded] re-entrant access to things");
  expect(g.isHeld()).toBe(false);
  expect(g.with((m) => m.set("a", 1).size)).toBe(1);
});
