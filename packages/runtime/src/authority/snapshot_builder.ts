import type {
  ClassRegistry,
  ClientId,
  NetworkPriority,
  ObjectId,
  ObjectInstance,
  ObjectRegistry,
  ObjectStateSnapshot,
  PropertyDefinition,
  PropertyStore,
  PropertyValue,
} from "@mirrorsync/core";
import type { RelevanceView } from "@mirrorsync/relevancy";
import type { ChangeTracker } from "./change_tracker";

export type CustomCondition = (client: ClientId, object: ObjectInstance, def: PropertyDefinition) => boolean;

export interface SnapshotBuilderDeps {
  classes: ClassRegistry;
  objects: ObjectRegistry;
  store: PropertyStore;
  tracker: ChangeTracker;
  priorityOf: (object: ObjectId) => NetworkPriority;
  customCondition?: CustomCondition;
}

export class SnapshotBuilder {
  private custom: CustomCondition;

  constructor(private readonly deps: SnapshotBuilderDeps) {
    this.custom = deps.customCondition ?? (() => true);
  }

  setCustomCondition(fn: CustomCondition) {
    this.custom = fn;
  }

  // ServerOnly никому, OwnerOnly только владельцу, Custom решает предикат
  private visibleTo(client: ClientId, obj: ObjectInstance, def: PropertyDefinition): boolean {
    switch (def.condition) {
      case "ServerOnly":
        return false;
      case "OwnerOnly":
        return obj.ownerId === client;
      case "Custom":
        return this.custom(client, obj, def);
      default:
        return true;
    }
  }

  private replicates(obj: ObjectInstance): boolean {
    const cls = this.deps.classes.getClass(obj.classId);
    return cls?.replicates ?? false;
  }

  private collect(
    client: ClientId,
    obj: ObjectInstance,
    changed: ReadonlyMap<string, PropertyValue>,
    full: boolean
  ): Map<string, PropertyValue> {
    const out = new Map<string, PropertyValue>();
    for (const def of this.deps.classes.replicatedProperties(obj.classId)) {
      const wanted = full || changed.has(def.name) || def.condition === "Always";
      if (!wanted || !this.visibleTo(client, obj, def)) continue;
      const value = changed.get(def.name) ?? this.deps.store.get(obj.objectId, def.name);
      if (value !== undefined) out.set(def.name, value);
    }
    return out;
  }

  /**
  Снимки для клиента: объект новый или изменён и релевантен.
  Новый -> полный снимок (isNew), изменённый -> дельта, пустая дельта опускается. */
  buildSnapshotsForClient(client: ClientId, relevant: RelevanceView): ObjectStateSnapshot[] {
    const out: ObjectStateSnapshot[] = [];
    for (const [id, delta] of this.deps.tracker.entries()) {
      if (!relevant.has(id)) continue;
      const obj = this.deps.objects.get(id);
      if (!obj || obj.state === "Destroyed" || !this.replicates(obj)) continue;
      const properties = this.collect(client, obj, delta.changed, delta.isNew);
      if (!delta.isNew && properties.size === 0) continue;
      out.push(this.snapshot(obj, properties, delta.isNew));
    }
    return out;
  }

  // полный снимок вне трекера (первая доставка клиенту)
  buildFullSnapshot(client: ClientId, id: ObjectId): ObjectStateSnapshot | undefined {
    const obj = this.deps.objects.get(id);
    if (!obj || obj.state === "Destroyed" || !this.replicates(obj)) return undefined;
    const changed = this.deps.tracker.get(id)?.changed ?? new Map<string, PropertyValue>();
    return this.snapshot(obj, this.collect(client, obj, changed, true), true);
  }

  private snapshot(obj: ObjectInstance, properties: Map<string, PropertyValue>, isNew: boolean): ObjectStateSnapshot {
    return {
      objectId: obj.objectId,
      classId: obj.classId,
      className: obj.className,
      properties,
      isNew,
      priority: this.deps.priorityOf(obj.objectId),
    };
  }
}
