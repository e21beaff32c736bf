import { err, ok, type Caller, type ClientId, type EntityId, type Result } from "@mirrorsync/core";

export type ZoneId = number;

export const GLOBAL_ZONE_ID: ZoneId = 0;

export interface Zone {
  zoneId: ZoneId;
  name: string;
  active: boolean;
  ownerId?: ClientId;
}

export interface ZonePatch {
  name?: string;
  active?: boolean;
}

export interface ZoneMember {
  entityId: EntityId;
  isClient: boolean;
}

const EMPTY: ReadonlySet<ZoneId> = new Set();

/**
Зоны и членство сущностей (many-to-many). Зона 0 глобальная: создаётся
сразу, не удаляется. version растёт при любом изменении. */
export class ZoneRegistry {
  private zones = new Map<ZoneId, Zone>();
  private byEntity = new Map<EntityId, Set<ZoneId>>();
  private byZone = new Map<ZoneId, Map<EntityId, boolean>>(); // entity -> isClient
  private _version = 0;

  constructor(globalZoneName = "Global") {
    this.zones.set(GLOBAL_ZONE_ID, { zoneId: GLOBAL_ZONE_ID, name: globalZoneName, active: true });
    this.byZone.set(GLOBAL_ZONE_ID, new Map());
  }

  get version() {
    return this._version;
  }

  private bump() {
    this._version = (this._version + 1) >>> 0;
  }

  private nextZoneId(): ZoneId {
    let max = GLOBAL_ZONE_ID;
    for (const id of this.zones.keys()) if (id > max) max = id;
    return max + 1;
  }

  // владелец зоны или админ; ничейные зоны правит только админ
  private canManage(sender: Caller, zone: Zone) {
    return sender.admin || (zone.ownerId != null && zone.ownerId === sender.clientId);
  }

  createZone(sender: Caller, name: string, active = true): Result<Zone> {
    const zone: Zone = { zoneId: this.nextZoneId(), name, active, ownerId: sender.clientId };
    this.zones.set(zone.zoneId, zone);
    this.byZone.set(zone.zoneId, new Map());
    this.bump();
    return ok({ ...zone });
  }

  updateZone(sender: Caller, zoneId: ZoneId, patch: ZonePatch): Result<Zone> {
    const zone = this.zones.get(zoneId);
    if (!zone) return err("NotFound", `zone ${zoneId} does not exist`);
    if (!this.canManage(sender, zone)) return err("PermissionDenied", `not allowed to update zone ${zoneId}`);
    if (patch.name != null) zone.name = patch.name;
    if (patch.active != null) zone.active = patch.active;
    this.bump();
    return ok({ ...zone });
  }

  deleteZone(sender: Caller, zoneId: ZoneId): Result<void> {
    if (zoneId === GLOBAL_ZONE_ID) return err("PermissionDenied", "the global zone cannot be deleted");
    const zone = this.zones.get(zoneId);
    if (!zone) return err("NotFound", `zone ${zoneId} does not exist`);
    if (!this.canManage(sender, zone)) return err("PermissionDenied", `not allowed to delete zone ${zoneId}`);
    for (const entity of this.byZone.get(zoneId)?.keys() ?? []) {
      const set = this.byEntity.get(entity);
      set?.delete(zoneId);
      if (set && set.size === 0) this.byEntity.delete(entity);
    }
    this.byZone.delete(zoneId);
    this.zones.delete(zoneId);
    this.bump();
    return ok(undefined);
  }

  getZone(zoneId: ZoneId): Zone | undefined {
    const z = this.zones.get(zoneId);
    return z ? { ...z } : undefined;
  }

  allZones(): Zone[] {
    return [...this.zones.values()].map((z) => ({ ...z }));
  }

  activeZones(): Zone[] {
    return this.allZones().filter((z) => z.active);
  }

  addToZone(entity: EntityId, zoneId: ZoneId, isClient = false): Result<void> {
    const members = this.byZone.get(zoneId);
    if (!members) return err("NotFound", `zone ${zoneId} does not exist`);
    if (members.has(entity)) return ok(undefined);
    members.set(entity, isClient);
    let set = this.byEntity.get(entity);
    if (!set) this.byEntity.set(entity, (set = new Set()));
    set.add(zoneId);
    this.bump();
    return ok(undefined);
  }

  addManyToZone(entities: ReadonlyArray<ZoneMember>, zoneId: ZoneId): Result<void> {
    if (!this.zones.has(zoneId)) return err("NotFound", `zone ${zoneId} does not exist`);
    for (const e of entities) this.addToZone(e.entityId, zoneId, e.isClient);
    return ok(undefined);
  }

  // отсутствие членства не ошибка
  removeFromZone(entity: EntityId, zoneId: ZoneId): Result<void> {
    const members = this.byZone.get(zoneId);
    if (!members?.delete(entity)) return ok(undefined);
    const set = this.byEntity.get(entity);
    set?.delete(zoneId);
    if (set && set.size === 0) this.byEntity.delete(entity);
    this.bump();
    return ok(undefined);
  }

  removeFromAllZones(entity: EntityId): number {
    const set = this.byEntity.get(entity);
    if (!set) return 0;
    for (const z of set) this.byZone.get(z)?.delete(entity);
    this.byEntity.delete(entity);
    this.bump();
    return set.size;
  }

  addClientToDefaultZones(client: ClientId): Result<void> {
    return this.addToZone(client, GLOBAL_ZONE_ID, true);
  }

  zonesOf(entity: EntityId): ZoneId[] {
    return [...(this.byEntity.get(entity) ?? EMPTY)].sort((a, b) => a - b);
  }

  // только активные зоны участвуют в SameZone
  activeZonesOf(entity: EntityId): Set<ZoneId> {
    const out = new Set<ZoneId>();
    for (const z of this.byEntity.get(entity) ?? EMPTY) if (this.zones.get(z)?.active) out.add(z);
    return out;
  }

  membersOf(zoneId: ZoneId): ZoneMember[] {
    const m = this.byZone.get(zoneId);
    if (!m) return [];
    return [...m].map(([entityId, isClient]) => ({ entityId, isClient }));
  }

  isMember(entity: EntityId, zoneId: ZoneId): boolean {
    return this.byEntity.get(entity)?.has(zoneId) ?? false;
  }

  shareAnyZone(a: EntityId, b: EntityId): boolean {
    const za = this.activeZonesOf(a);
    if (za.size === 0) return false;
    for (const z of this.activeZonesOf(b)) if (za.has(z)) return true;
    return false;
  }

  entitiesInSameZones(entity: EntityId): Set<EntityId> {
    const out = new Set<EntityId>();
    for (const z of this.activeZonesOf(entity)) {
      for (const other of this.byZone.get(z)?.keys() ?? []) if (other !== entity) out.add(other);
    }
    return out;
  }

  // снимок для кэша движка: сущность -> активные зоны
  snapshotActiveMemberships(): Map<EntityId, Set<ZoneId>> {
    const out = new Map<EntityId, Set<ZoneId>>();
    for (const entity of this.byEntity.keys()) {
      const zs = this.activeZonesOf(entity);
      if (zs.size) out.set(entity, zs);
    }
    return out;
  }
}
