import type { EntityId, Vec3 } from "@mirrorsync/core";

// Равномерная сетка: сущность -> клетка, клетка -> сущности
export class AOIGrid {
  constructor(public readonly cellSize: number) {
    if (!(cellSize > 0)) throw new Error("cellSize must be positive");
  }

  private cell(p: Vec3) {
    return {
      cx: Math.floor(p.x / this.cellSize),
      cy: Math.floor(p.y / this.cellSize),
      cz: Math.floor(p.z / this.cellSize),
    };
  }
  private key(cx: number, cy: number, cz: number) {
    return `${cx},${cy},${cz}`;
  }

  private entityCell = new Map<EntityId, string>();
  private cellEntities = new Map<string, Set<EntityId>>();

  upsert(entityId: EntityId, p: Vec3) {
    const { cx, cy, cz } = this.cell(p);
    const k = this.key(cx, cy, cz);
    const prev = this.entityCell.get(entityId);
    if (prev === k) return;
    if (prev) this.detach(entityId, prev);
    this.entityCell.set(entityId, k);
    let s = this.cellEntities.get(k);
    if (!s) this.cellEntities.set(k, (s = new Set()));
    s.add(entityId);
  }

  remove(entityId: EntityId) {
    const prev = this.entityCell.get(entityId);
    if (!prev) return;
    this.detach(entityId, prev);
    this.entityCell.delete(entityId);
  }

  private detach(entityId: EntityId, k: string) {
    const s = this.cellEntities.get(k);
    if (!s) return;
    s.delete(entityId);
    if (s.size === 0) this.cellEntities.delete(k);
  }

  // Кандидаты из соседних клеток (без точной фильтрации по радиусу)
  queryCells(p: Vec3, radius: number, out: EntityId[] = []): EntityId[] {
    out.length = 0;
    const { cx, cy, cz } = this.cell(p);
    const cr = Math.ceil(radius / this.cellSize);
    // радиус больше сетки: быстрее пройти все занятые клетки
    if ((2 * cr + 1) ** 3 > this.cellEntities.size) {
      for (const s of this.cellEntities.values()) for (const eid of s) out.push(eid);
      return out;
    }
    for (let dx = -cr; dx <= cr; dx++) {
      for (let dy = -cr; dy <= cr; dy++) {
        for (let dz = -cr; dz <= cr; dz++) {
          const s = this.cellEntities.get(this.key(cx + dx, cy + dy, cz + dz));
          if (!s) continue;
          for (const eid of s) out.push(eid);
        }
      }
    }
    return out;
  }

  size() {
    return this.entityCell.size;
  }

  clear() {
    this.entityCell.clear();
    this.cellEntities.clear();
  }
}
