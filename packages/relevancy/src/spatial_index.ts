import { vecDistanceSq, type ClientId, type EntityId, type PropertyValue, type Vec3 } from "@mirrorsync/core";
import { AOIGrid } from "./spatial/grid";

export const POSITION_PROPERTIES: ReadonlySet<string> = new Set(["Location", "Position", "Transform"]);

export function isPositionProperty(name: string): boolean {
  return POSITION_PROPERTIES.has(name);
}

export function positionOf(v: PropertyValue): Vec3 | undefined {
  if (v.type === "Vector") return v.value;
  if (v.type === "Transform") return v.value.position;
  return undefined;
}

/** Кэш позиций сущностей (клиенты и объекты) с сеткой для запросов по радиусу. */
export class SpatialIndex {
  private positions = new Map<EntityId, Vec3>();
  private grid: AOIGrid;

  constructor(cellSize = 500) {
    this.grid = new AOIGrid(cellSize);
  }

  update(id: EntityId, p: Vec3) {
    const pos = { x: p.x, y: p.y, z: p.z };
    this.positions.set(id, pos);
    this.grid.upsert(id, pos);
  }

  // true, если свойство позиционное и позиция обновлена
  updateFromProperty(id: EntityId, name: string, value: PropertyValue): boolean {
    if (!isPositionProperty(name)) return false;
    const p = positionOf(value);
    if (!p) return false;
    this.update(id, p);
    return true;
  }

  position(id: EntityId): Vec3 | undefined {
    return this.positions.get(id);
  }

  remove(id: EntityId) {
    this.positions.delete(id);
    this.grid.remove(id);
  }

  distanceSq(a: EntityId, b: EntityId): number | undefined {
    const pa = this.positions.get(a);
    const pb = this.positions.get(b);
    if (!pa || !pb) return undefined;
    return vecDistanceSq(pa, pb);
  }

  // false, если позиция одной из сторон неизвестна
  withinDistance(a: EntityId, b: EntityId, maxDistance: number): boolean {
    const d = this.distanceSq(a, b);
    return d !== undefined && d <= maxDistance * maxDistance;
  }

  entitiesWithin(center: Vec3, maxDistance: number): EntityId[] {
    const r2 = maxDistance * maxDistance;
    const out: EntityId[] = [];
    for (const id of this.grid.queryCells(center, maxDistance)) {
      const p = this.positions.get(id);
      if (p && vecDistanceSq(center, p) <= r2) out.push(id);
    }
    return out;
  }

  clientsWithin(entity: EntityId, maxDistance: number, clients: Iterable<ClientId>): ClientId[] {
    const center = this.positions.get(entity);
    if (!center) return [];
    const near = new Set(this.entitiesWithin(center, maxDistance));
    const out: ClientId[] = [];
    for (const c of clients) if (near.has(c)) out.push(c);
    return out;
  }

  size() {
    return this.positions.size;
  }

  clear() {
    this.positions.clear();
    this.grid.clear();
  }
}
