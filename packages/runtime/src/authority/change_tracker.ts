import type { ObjectId, PropertyValue } from "@mirrorsync/core";

export interface ObjectDelta {
  isNew: boolean;
  changed: Map<string, PropertyValue>;
}

/**
Дельты текущего тика: изменённые свойства, новые и уничтоженные объекты.
Уничтожение отбрасывает накопленные изменения объекта и флаг isNew. */
export class ChangeTracker {
  private deltas = new Map<ObjectId, ObjectDelta>();
  private destroyed = new Set<ObjectId>();

  private entry(id: ObjectId): ObjectDelta {
    let d = this.deltas.get(id);
    if (!d) this.deltas.set(id, (d = { isNew: false, changed: new Map() }));
    return d;
  }

  // false для объекта, уничтоженного в этом же тике
  recordChange(id: ObjectId, property: string, value: PropertyValue): boolean {
    if (this.destroyed.has(id)) return false;
    this.entry(id).changed.set(property, value);
    return true;
  }

  recordNew(id: ObjectId) {
    this.destroyed.delete(id);
    this.entry(id).isNew = true;
  }

  recordDestroyed(id: ObjectId) {
    this.deltas.delete(id);
    this.destroyed.add(id);
  }

  get(id: ObjectId): ObjectDelta | undefined {
    return this.deltas.get(id);
  }

  entries(): IterableIterator<[ObjectId, ObjectDelta]> {
    return this.deltas.entries();
  }

  destroyedObjects(): ReadonlySet<ObjectId> {
    return this.destroyed;
  }

  isEmpty() {
    return this.deltas.size === 0 && this.destroyed.size === 0;
  }

  /**
  Очищает дельты. retain(id) = true оставляет дельту объекта до следующего
  тика (его частота ещё не подошла). Уничтоженные чистятся всегда. */
  flush(retain: (id: ObjectId) => boolean = () => false) {
    for (const id of [...this.deltas.keys()]) {
      if (!retain(id)) this.deltas.delete(id);
    }
    this.destroyed.clear();
  }
}
