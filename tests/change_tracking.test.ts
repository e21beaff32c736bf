import { ClassRegistry, ObjectRegistry, PropertyStore, PV } from "@mirrorsync/core";
import { ChangeTracker, ReplicationQueue, SnapshotBuilder } from "@mirrorsync/runtime";

const everyone = { has: () => true };

function setup() {
  const classes = new ClassRegistry();
  const pawn = classes.defineClass({
    name: "Pawn",
    parent: "Actor",
    properties: [
      { name: "Health", type: "Int32" },
      { name: "Secret", type: "String", condition: "ServerOnly" },
      { name: "Ammo", type: "Int32", condition: "OwnerOnly" },
      { name: "Heartbeat", type: "Int32", condition: "Always" },
      { name: "Local", type: "Int32", replicated: false },
    ],
  });
  if (!pawn.ok) throw new Error("setup failed");
  const objects = new ObjectRegistry();
  const store = new PropertyStore();
  const tracker = new ChangeTracker();
  const builder = new SnapshotBuilder({ classes, objects, store, tracker, priorityOf: () => "Normal" });
  objects.create(1000n, pawn.data.classId, "Pawn", 0, 7n);
  objects.setState(1000n, "Active", 0);
  store.setMany(1000n, [
    ["Health", PV.int32(100)],
    ["Secret", PV.string("s")],
    ["Ammo", PV.int32(30)],
    ["Heartbeat", PV.int32(1)],
    ["Local", PV.int32(5)],
  ]);
  return { classes, objects, store, tracker, builder, classId: pawn.data.classId };
}

test("destroy discards pending changes and blocks new ones", () => {
  const t = new ChangeTracker();
  t.recordNew(1n);
  t.recordChange(1n, "A", PV.int32(1));
  t.recordDestroyed(1n);
  expect(t.get(1n)).toBeUndefined();
  expect(t.recordChange(1n, "A", PV.int32(2))).toBe(false);
  expect([...t.destroyedObjects()]).toEqual([1n]);
  t.flush();
  expect(t.isEmpty()).toBe(true);
});

test("flush keeps retained deltas", () => {
  const t = new ChangeTracker();
  t.recordChange(1n, "A", PV.int32(1));
  t.recordChange(2n, "A", PV.int32(1));
  t.flush((id) => id === 2n);
  expect(t.get(1n)).toBeUndefined();
  expect(t.get(2n)?.changed.get("A")).toEqual(PV.int32(1));
});

test("new objects produce a full snapshot filtered by condition", () => {
  const { tracker, builder } = setup();
  tracker.recordNew(1000n);
  const [forOwner] = builder.buildSnapshotsForClient(7n, everyone);
  expect(forOwner?.isNew).toBe(true);
  expect([...(forOwner?.properties.keys() ?? [])].sort()).toEqual(["Ammo", "Health", "Heartbeat"]);
  const [forOther] = builder.buildSnapshotsForClient(8n, everyone);
  expect([...(forOther?.properties.keys() ?? [])].sort()).toEqual(["Health", "Heartbeat"]);
});

test("deltas carry changed and Always properties only", () => {
  const { tracker, builder } = setup();
  tracker.recordChange(1000n, "Health", PV.int32(90));
  const snaps = builder.buildSnapshotsForClient(8n, everyone);
  expect(snaps).toHaveLength(1);
  expect(snaps[0]?.isNew).toBe(false);
  expect(snaps[0]?.properties).toEqual(
    new Map([
      ["Health", PV.int32(90)],
      ["Heartbeat", PV.int32(1)],
    ])
  );
});

test("a delta with nothing visible still carries Always properties", () => {
  const { tracker, builder } = setup();
  tracker.recordChange(1000n, "Secret", PV.string("t"));
  const snaps = builder.buildSnapshotsForClient(8n, everyone);
  expect([...(snaps[0]?.properties.keys() ?? [])]).toEqual(["Heartbeat"]);
});

test("irrelevant or non-replicating objects are skipped", () => {
  const { classes, objects, tracker, builder } = setup();
  tracker.recordNew(1000n);
  expect(builder.buildSnapshotsForClient(7n, { has: () => false })).toEqual([]);
  const hidden = classes.defineClass({ name: "Hidden", replicates: false, properties: [{ name: "X", type: "Int32" }] });
  if (!hidden.ok) throw new Error("define failed");
  objects.create(1001n, hidden.data.classId, "Hidden", 0);
  tracker.recordNew(1001n);
  expect(builder.buildSnapshotsForClient(7n, everyone).map((s) => s.objectId)).toEqual([1000n]);
  expect(builder.buildFullSnapshot(7n, 1001n)).toBeUndefined();
});

test("custom property condition", () => {
  const { classes, tracker, builder, classId } = setup();
  classes.defineProperty("Pawn", { name: "Team", type: "String", condition: "Custom" });
  builder.setCustomCondition((client) => client === 8n);
  tracker.recordChange(1000n, "Team", PV.string("red"));
  expect(builder.buildSnapshotsForClient(8n, everyone)[0]?.properties.get("Team")).toEqual(PV.string("red"));
  expect(builder.buildSnapshotsForClient(9n, everyone)[0]?.properties.has("Team")).toBe(false);
  expect(classes.getProperty(classId, "Team")?.condition).toBe("Custom");
});

test("replication queue drains once", () => {
  const q = new ReplicationQueue();
  q.enqueue({ objectId: 1n, propertyName: "A", timestamp: 1, highPriority: false });
  expect(q.size()).toBe(1);
  expect(q.drain()).toHaveLength(1);
  expect(q.drain()).toEqual([]);
});
