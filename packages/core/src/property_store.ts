import type { ObjectId } from "./id";
import type { PropertyValue } from "./types";

// object -> (имя свойства -> значение)
export class PropertyStore {
  private data = new Map<ObjectId, Map<string, PropertyValue>>();

  get(id: ObjectId, name: string): PropertyValue | undefined {
    return this.data.get(id)?.get(name);
  }

  set(id: ObjectId, name: string, value: PropertyValue) {
    let m = this.data.get(id);
    if (!m) {
      m = new Map();
      this.data.set(id, m);
    }
    m.set(name, value);
  }

  setMany(id: ObjectId, values: Iterable<readonly [string, PropertyValue]>) {
    for (const [k, v] of values) this.set(id, k, v);
  }

  all(id: ObjectId): ReadonlyMap<string, PropertyValue> {
    return this.data.get(id) ?? new Map();
  }

  has(id: ObjectId, name: string): boolean {
    return this.data.get(id)?.has(name) ?? false;
  }

  delete(id: ObjectId, name: string): boolean {
    const m = this.data.get(id);
    if (!m) return false;
    const removed = m.delete(name);
    if (m.size === 0) this.data.delete(id);
    return removed;
  }

  deleteObject(id: ObjectId): boolean {
    return this.data.delete(id);
  }

  objectCount() {
    return this.data.size;
  }
}
