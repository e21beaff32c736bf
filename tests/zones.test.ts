import { GLOBAL_ZONE_ID, ZoneRegistry } from "@mirrorsync/relevancy";

const admin = { clientId: 1n, admin: true };
const alice = { clientId: 2n, admin: false };
const bob = { clientId: 3n, admin: false };

test("global zone exists and cannot be deleted", () => {
  const zones = new ZoneRegistry();
  expect(zones.getZone(GLOBAL_ZONE_ID)).toEqual({ zoneId: 0, name: "Global", active: true });
  const r = zones.deleteZone(admin, GLOBAL_ZONE_ID);
  expect(r.ok ? null : r.error.kind).toBe("PermissionDenied");
});

test("create assigns increasing ids and ownership", () => {
  const zones = new ZoneRegistry();
  const a = zones.createZone(alice, "arena");
  const b = zones.createZone(bob, "lobby", false);
  expect(a.ok && a.data).toEqual({ zoneId: 1, name: "arena", active: true, ownerId: 2n });
  expect(b.ok && b.data.zoneId).toBe(2);
  expect(zones.activeZones().map((z) => z.zoneId)).toEqual([0, 1]);
});

test("only owner or admin may update or delete", () => {
  const zones = new ZoneRegistry();
  zones.createZone(alice, "arena");
  const denied = zones.updateZone(bob, 1, { name: "mine" });
  expect(denied.ok ? null : denied.error.kind).toBe("PermissionDenied");
  const renamed = zones.updateZone(alice, 1, { name: "pit", active: false });
  expect(renamed.ok && renamed.data).toEqual({ zoneId: 1, name: "pit", active: false, ownerId: 2n });
  const unowned = zones.updateZone(alice, GLOBAL_ZONE_ID, { name: "x" });
  expect(unowned.ok ? null : unowned.error.kind).toBe("PermissionDenied");
  expect(zones.updateZone(admin, GLOBAL_ZONE_ID, { name: "World" }).ok).toBe(true);
  const missing = zones.deleteZone(admin, 99);
  expect(missing.ok ? null : missing.error.kind).toBe("NotFound");
  expect(zones.deleteZone(admin, 1).ok).toBe(true);
  expect(zones.getZone(1)).toBeUndefined();
});

test("membership is idempotent and many-to-many", () => {
  const zones = new ZoneRegistry();
  zones.createZone(admin, "a");
  zones.createZone(admin, "b");
  expect(zones.addToZone(1000n, 1).ok).toBe(true);
  const v = zones.version;
  expect(zones.addToZone(1000n, 1).ok).toBe(true);
  expect(zones.version).toBe(v);
  zones.addManyToZone(
    [
      { entityId: 1000n, isClient: false },
      { entityId: 7n, isClient: true },
    ],
    2
  );
  expect(zones.zonesOf(1000n)).toEqual([1, 2]);
  expect(zones.membersOf(2)).toEqual([
    { entityId: 1000n, isClient: false },
    { entityId: 7n, isClient: true },
  ]);
  const missing = zones.addToZone(1n, 42);
  expect(missing.ok ? null : missing.error.kind).toBe("NotFound");
  expect(zones.removeFromZone(555n, 1).ok).toBe(true);
  expect(zones.removeFromAllZones(1000n)).toBe(2);
  expect(zones.zonesOf(1000n)).toEqual([]);
});

test("inactive zones do not connect members", () => {
  const zones = new ZoneRegistry();
  zones.createZone(admin, "a");
  zones.addToZone(1000n, 1);
  zones.addToZone(7n, 1, true);
  expect(zones.shareAnyZone(1000n, 7n)).toBe(true);
  expect([...zones.entitiesInSameZones(7n)]).toEqual([1000n]);
  zones.updateZone(admin, 1, { active: false });
  expect(zones.shareAnyZone(1000n, 7n)).toBe(false);
  expect(zones.isMember(1000n, 1)).toBe(true);
});

test("deleting a zone drops its memberships", () => {
  const zones = new ZoneRegistry();
  zones.createZone(alice, "a");
  zones.addToZone(1000n, 1);
  zones.addClientToDefaultZones(2n);
  expect(zones.deleteZone(alice, 1).ok).toBe(true);
  expect(zones.zonesOf(1000n)).toEqual([]);
  expect(zones.zonesOf(2n)).toEqual([0]);
});
