import type { Caller, ReplicationBatch } from "@mirrorsync/core";
import type { SpawnRequest } from "@mirrorsync/net";
import { AuthorityContext, createLogger, ReplicationScheduler, type ReplicationSink } from "@mirrorsync/runtime";

const alice: Caller = { clientId: 2n, admin: false };

function spawnReq(position: [number, number, number] = [0, 0, 0]): SpawnRequest {
  return {
    class_id: 101,
    actor_name: "Crate",
    position,
    rotation: [0, 0, 0, 1],
    scale: [1, 1, 1],
    initial_properties: [],
  };
}

function setup(sink?: ReplicationSink) {
  const lines: string[] = [];
  const log = createLogger({ name: "t", level: "warn", json: true, pretty: false, sink: (l) => lines.push(l) });
  const ctx = new AuthorityContext({ clock: () => 0, logger: log });
  const r = ctx.classes.defineClass({ name: "Crate", parent: "Actor", properties: [{ name: "Health", type: "Int32" }] });
  if (!r.ok) throw new Error("setup failed");
  const batches: ReplicationBatch[] = [];
  const scheduler = new ReplicationScheduler(ctx, sink ?? ((b) => batches.push(b)), {
    tombstoneRetentionMs: 1000,
    logger: log,
  });
  return { ctx, scheduler, batches, lines };
}

test("new objects go out once as full snapshots, changes as deltas", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  expect(scheduler.tick(0)).toEqual({ tick: 1, drained: 0, destroyed: 0, purged: 0, batches: 1, snapshots: 1 });
  const first = batches[0]?.snapshots[0];
  expect(first?.isNew).toBe(true);
  expect([...(first?.properties.keys() ?? [])]).toEqual(["Location", "Rotation", "Scale", "ActorName"]);
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(true);

  expect(scheduler.tick(1)?.batches).toBe(0);

  ctx.setProperty(alice, 1000n, "Health", "7");
  const report = scheduler.tick(2);
  expect(report?.drained).toBe(1);
  const delta = batches[1]?.snapshots[0];
  expect(delta?.isNew).toBe(false);
  expect(delta?.properties).toEqual(new Map([["Health", { type: "Int32", value: 7 }]]));
});

test("late joiners get a full snapshot of what is already there", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  expect(batches).toEqual([]);
  ctx.connectClient(11n);
  scheduler.tick(1);
  expect(batches[0]?.clientId).toBe(11n);
  expect(batches[0]?.snapshots[0]?.isNew).toBe(true);
});

test("a delta for an object the client never had is upgraded to a full snapshot", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.connectClient(12n);
  ctx.setProperty(alice, 1000n, "Health", "3");
  scheduler.tick(1);
  const snap = batches[0]?.snapshots[0];
  expect(snap?.isNew).toBe(true);
  expect(snap?.properties.get("Health")).toEqual({ type: "Int32", value: 3 });
  expect(snap?.properties.has("Location")).toBe(true);
});

test("destroyed objects become tombstones for clients that had them", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.destroy(alice, 1000n);
  const report = scheduler.tick(1);
  expect(report?.destroyed).toBe(1);
  expect(batches[1]).toEqual({ clientId: 10n, tick: 2, snapshots: [], tombstones: [1000n] });
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(false);
  expect(scheduler.tick(1000)?.purged).toBe(0);
  expect(scheduler.tick(2001)?.purged).toBe(1);
  expect(ctx.objects.has(1000n)).toBe(false);
});

test("batches are ordered by priority then id", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.spawn(alice, spawnReq());
  ctx.spawn(alice, spawnReq());
  ctx.setRelevancy(alice, 1002n, { level: "AlwaysRelevant", frequency: "High", priority: "Critical" });
  ctx.setRelevancy(alice, 1000n, { level: "AlwaysRelevant", frequency: "High", priority: "Low" });
  scheduler.tick(0);
  expect(batches[0]?.snapshots.map((s) => [s.objectId, s.priority])).toEqual([
    [1002n, "Critical"],
    [1001n, "Normal"],
    [1000n, "Low"],
  ]);
});

test("low-frequency objects keep their delta until due", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.setRelevancy(alice, 1000n, { level: "AlwaysRelevant", frequency: "Low", priority: "Normal" });
  const ticks = [0, 1, 2, 3].map((t) => scheduler.tick(t)?.batches);
  expect(ticks).toEqual([0, 0, 0, 1]);
  expect(batches[0]?.tick).toBe(4);
  expect(batches[0]?.snapshots[0]?.isNew).toBe(true);
});

test("never-relevant objects are never sent", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.setRelevancy(alice, 1000n, { level: "NeverRelevant", frequency: "High", priority: "Normal" });
  for (let t = 0; t < 5; t++) scheduler.tick(t);
  expect(batches).toEqual([]);
});

test("leaving and re-entering relevance resends a full snapshot", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.updateClientPosition(10n, { x: 0, y: 0, z: 0 });
  ctx.spawn(alice, spawnReq([1, 0, 0]));
  ctx.setRelevancy(alice, 1000n, { level: "DistanceBased", frequency: "High", priority: "Normal", maxDistance: 10 });
  scheduler.tick(0);
  expect(batches).toHaveLength(1);
  ctx.updateClientPosition(10n, { x: 100, y: 0, z: 0 });
  scheduler.tick(1);
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(false);
  ctx.updateClientPosition(10n, { x: 5, y: 0, z: 0 });
  scheduler.tick(2);
  expect(batches).toHaveLength(2);
  expect(batches[1]?.snapshots[0]?.isNew).toBe(true);
});

test("re-entrant ticks are refused and logged", () => {
  let inner: unknown = "unset";
  const holder: { scheduler?: ReplicationScheduler } = {};
  const { ctx, scheduler, lines } = setup(() => {
    inner = holder.scheduler?.tick(5);
  });
  holder.scheduler = scheduler;
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  expect(scheduler.tick(0)?.batches).toBe(1);
  expect(inner).toBeNull();
  expect(JSON.parse(lines[0] ?? "{}").msg).toBe("tick refused: previous tick still running");
  expect(scheduler.isRunning()).toBe(false);
});

test("a failing sink is logged and does not stop other clients", () => {
  const seen: bigint[] = [];
  let down = true;
  const { ctx, scheduler, lines } = setup((b) => {
    if (down && b.clientId === 10n) throw new Error("socket closed");
    seen.push(b.clientId);
  });
  ctx.connectClient(10n);
  ctx.connectClient(11n);
  ctx.spawn(alice, spawnReq());
  expect(scheduler.tick(0)?.batches).toBe(1);
  expect(seen).toEqual([11n]);
  const rec = JSON.parse(lines[0] ?? "{}");
  expect(rec.msg).toBe("replication sink failed");
  expect(rec.error).toBe("Error: socket closed");
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(false);
  expect(scheduler.hasReplicated(11n, 1000n)).toBe(true);

  down = false;
  expect(scheduler.tick(1)?.batches).toBe(1);
  expect(seen).toEqual([11n, 10n]);
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(true);
});

test("a tombstone lost to a failing sink is sent again", () => {
  let down = false;
  const batches: ReplicationBatch[] = [];
  const { ctx, scheduler } = setup((b) => {
    if (down) throw new Error("socket closed");
    batches.push(b);
  });
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.destroy(alice, 1000n);
  down = true;
  expect(scheduler.tick(1)?.batches).toBe(0);
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(true);
  down = false;
  scheduler.tick(2);
  expect(batches[1]).toEqual({ clientId: 10n, tick: 3, snapshots: [], tombstones: [1000n] });
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(false);
});

test("a failed delta is replaced by a full snapshot on the next tick", () => {
  let down = false;
  const batches: ReplicationBatch[] = [];
  const { ctx, scheduler } = setup((b) => {
    if (down) throw new Error("socket closed");
    batches.push(b);
  });
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.setProperty(alice, 1000n, "Health", "4");
  down = true;
  scheduler.tick(1);
  down = false;
  scheduler.tick(2);
  const snap = batches[1]?.snapshots[0];
  expect(snap?.isNew).toBe(true);
  expect(snap?.properties.get("Health")).toEqual({ type: "Int32", value: 4 });
});

test("critical writes do not bypass the low frequency tier", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.setRelevancy(alice, 1000n, { level: "AlwaysRelevant", frequency: "Low", priority: "Critical" });
  for (let t = 0; t < 4; t++) scheduler.tick(t);
  ctx.setProperty(alice, 1000n, "Health", "7");
  for (let t = 4; t < 8; t++) scheduler.tick(t);
  expect(batches.map((b) => b.tick)).toEqual([4, 8]);
  const delta = batches[1]?.snapshots[0];
  expect(delta?.isNew).toBe(false);
  expect(delta?.properties).toEqual(new Map([["Health", { type: "Int32", value: 7 }]]));
});

test("on-demand objects wait for an explicit request", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.setRelevancy(alice, 1000n, { level: "AlwaysRelevant", frequency: "OnDemand", priority: "High" });
  ctx.setProperty(alice, 1000n, "Health", "2");
  for (let t = 0; t < 3; t++) scheduler.tick(t);
  expect(batches).toEqual([]);
  ctx.engine.requestUpdate(1000n);
  scheduler.tick(3);
  expect(batches).toHaveLength(1);
  expect(batches[0]?.snapshots[0]?.isNew).toBe(true);
  expect(batches[0]?.snapshots[0]?.properties.get("Health")).toEqual({ type: "Int32", value: 2 });
});

test("urgent writes go first among equal priorities", () => {
  const { ctx, scheduler, batches } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.setProperty(alice, 1000n, "Health", "1");
  ctx.setProperty(alice, 1001n, "Health", "1");
  ctx.queue.enqueue({ objectId: 1001n, propertyName: "Health", timestamp: 0, highPriority: true });
  scheduler.tick(1);
  expect(batches[1]?.snapshots.map((s) => s.objectId)).toEqual([1001n, 1000n]);
});

test("disconnect forgets what the client received", () => {
  const { ctx, scheduler } = setup();
  ctx.connectClient(10n);
  ctx.spawn(alice, spawnReq());
  scheduler.tick(0);
  ctx.disconnectClient(10n);
  expect(scheduler.hasReplicated(10n, 1000n)).toBe(false);
});
