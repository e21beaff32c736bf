import {
  defaultTempIdSource,
  err,
  isTemporaryId,
  makeTemporaryId,
  NULL_OBJECT_ID,
  ok,
  type ClientId,
  type LifecycleState,
  type ObjectId,
  type ObjectStateSnapshot,
  type PropertyValue,
  type Result,
  type TempIdSource,
} from "@mirrorsync/core";
import { Guarded } from "@mirrorsync/utils";

export interface MirrorEntry {
  objectId: ObjectId;
  className: string;
  ownerId?: ClientId;
  state: LifecycleState;
  createdAt: number;
  properties: Map<string, PropertyValue>;
  needsIdRemap: boolean;
}

export interface LocalCreateParams {
  ownerId?: ClientId;
  properties?: Iterable<readonly [string, PropertyValue]>;
}

export type DestroyOutcome = "local" | "authority";

export interface ClientMirrorOptions {
  tempIds?: TempIdSource;
  clock?: () => number;
}

type PropMap = Map<string, PropertyValue>;

function mergeInto(target: PropMap, src: ReadonlyMap<string, PropertyValue> | undefined) {
  if (!src) return;
  for (const [k, v] of src) target.set(k, v);
}

function copyEntry(e: MirrorEntry): MirrorEntry {
  return { ...e, properties: new Map(e.properties) };
}

/**
Локальная копия состояния авторитета. Объекты и кэш ранних свойств
(staging) под отдельными Guarded; каждая операция одна критическая секция. */
export class ClientMirror {
  private readonly objects = new Guarded(new Map<ObjectId, MirrorEntry>(), "mirror");
  private readonly staging = new Guarded(new Map<ObjectId, PropMap>(), "staging");
  private readonly tempIds: TempIdSource;
  private readonly clock: () => number;

  constructor(opts: ClientMirrorOptions = {}) {
    this.tempIds = opts.tempIds ?? defaultTempIdSource;
    this.clock = opts.clock ?? (() => Date.now());
  }

  // ---------- staging ----------

  cacheProperty(id: ObjectId, name: string, value: PropertyValue) {
    this.staging.with((st) => {
      let m = st.get(id);
      if (!m) st.set(id, (m = new Map()));
      m.set(name, value);
    });
  }

  getCachedProperty(id: ObjectId, name: string): PropertyValue | undefined {
    return this.staging.with((st) => st.get(id)?.get(name));
  }

  stagedCount(id: ObjectId): number {
    return this.staging.with((st) => st.get(id)?.size ?? 0);
  }

  clearStaged(id: ObjectId): boolean {
    return this.staging.with((st) => st.delete(id));
  }

  private takeStaged(id: ObjectId): PropMap | undefined {
    return this.staging.with((st) => {
      const m = st.get(id);
      st.delete(id);
      return m;
    });
  }

  /** Забирает ранние свойства объекта; если объект уже есть, вливает их в него. */
  transferCachedPropertiesToObject(id: ObjectId): Map<string, PropertyValue> {
    return this.objects.with((objs) => {
      const staged = this.takeStaged(id) ?? new Map<string, PropertyValue>();
      const entry = objs.get(id);
      if (entry) mergeInto(entry.properties, staged);
      return new Map(staged);
    });
  }

  // ---------- объекты ----------

  createLocal(className: string, params: LocalCreateParams = {}): ObjectId {
    return this.objects.with((objs) => {
      let id = makeTemporaryId(this.tempIds);
      while (objs.has(id) || this.staging.with((st) => st.has(id))) id = makeTemporaryId(this.tempIds);
      objs.set(id, {
        objectId: id,
        className,
        ...(params.ownerId != null ? { ownerId: params.ownerId } : {}),
        state: "Initializing",
        createdAt: this.clock(),
        properties: new Map(),
        needsIdRemap: true,
      });
      for (const [k, v] of params.properties ?? []) this.cacheProperty(id, k, v);
      return id;
    });
  }

  /**
  Применяет снимок. Новый объект создаётся и забирает ранние свойства,
  значения снимка поверх. Дельта для неизвестного объекта уходит в staging. */
  apply(snapshot: ObjectStateSnapshot, ownerId?: ClientId): "created" | "updated" | "staged" {
    return this.objects.with((objs) => {
      const id = snapshot.objectId;
      let entry = objs.get(id);
      if (!entry) {
        if (!snapshot.isNew) {
          for (const [k, v] of snapshot.properties) this.cacheProperty(id, k, v);
          return "staged";
        }
        entry = {
          objectId: id,
          className: snapshot.className,
          ...(ownerId != null ? { ownerId } : {}),
          state: "Active",
          createdAt: this.clock(),
          properties: new Map(),
          needsIdRemap: false,
        };
        objs.set(id, entry);
        mergeInto(entry.properties, this.takeStaged(id));
        mergeInto(entry.properties, snapshot.properties);
        return "created";
      }
      mergeInto(entry.properties, snapshot.properties);
      return "updated";
    });
  }

  applyTombstone(id: ObjectId): boolean {
    return this.objects.with((objs) => {
      this.clearStaged(id);
      return objs.delete(id);
    });
  }

  updateProperty(id: ObjectId, name: string, value: PropertyValue): Result<void> {
    return this.objects.with((objs) => {
      const entry = objs.get(id);
      if (!entry) return err("NotFound", `object ${id} is not mirrored`);
      entry.properties.set(name, value);
      return ok(undefined);
    });
  }

  setLifecycleState(id: ObjectId, state: LifecycleState): Result<void> {
    return this.objects.with((objs) => {
      const entry = objs.get(id);
      if (!entry) return err("NotFound", `object ${id} is not mirrored`);
      entry.state = state;
      return ok(undefined);
    });
  }

  get(id: ObjectId): MirrorEntry | undefined {
    return this.objects.with((objs) => {
      const e = objs.get(id);
      return e ? copyEntry(e) : undefined;
    });
  }

  has(id: ObjectId): boolean {
    return this.objects.with((objs) => objs.has(id));
  }

  ids(): ObjectId[] {
    return this.objects.with((objs) => [...objs.keys()]);
  }

  size(): number {
    return this.objects.with((objs) => objs.size);
  }

  pendingRemaps(): ObjectId[] {
    return this.objects.with((objs) => [...objs.values()].filter((e) => e.needsIdRemap).map((e) => e.objectId));
  }

  /**
  tempId -> serverId за одну секцию над картой объектов. Порядок слияния:
  свойства записи, staging под tempId, staging под serverId, затем свойства
  уже существующей записи serverId (сервер побеждает). */
  remapEntry(tempId: ObjectId, serverId: ObjectId): Result<void> {
    return this.objects.with((objs) => {
      const entry = objs.get(tempId);
      if (!entry || !entry.needsIdRemap) return err("NotFound", `no object pending remap under ${tempId}`);
      if (serverId === NULL_OBJECT_ID || isTemporaryId(serverId)) {
        return err("ValidationFailed", `invalid authority id ${serverId}`);
      }
      const existing = objs.get(serverId);
      if (existing?.needsIdRemap) return err("AlreadyExists", `${serverId} is itself pending remap`);

      const speculative = this.takeStaged(tempId);
      const fromServer = this.takeStaged(serverId);
      const properties = new Map(entry.properties);
      mergeInto(properties, speculative);
      mergeInto(properties, fromServer);
      if (existing) mergeInto(properties, existing.properties);

      objs.delete(tempId);
      objs.set(serverId, {
        ...entry,
        ...(existing?.ownerId != null ? { ownerId: existing.ownerId } : {}),
        objectId: serverId,
        state: existing?.state ?? (entry.state === "Initializing" ? "Active" : entry.state),
        properties,
        needsIdRemap: false,
      });
      return ok(undefined);
    });
  }

  // не подтверждённый объект удаляется целиком на клиенте
  discardPending(tempId: ObjectId): Result<void> {
    return this.objects.with((objs) => {
      const entry = objs.get(tempId);
      if (!entry || !entry.needsIdRemap) return err("NotFound", `no object pending remap under ${tempId}`);
      objs.delete(tempId);
      this.clearStaged(tempId);
      return ok(undefined);
    });
  }

  destroyEntry(id: ObjectId): Result<DestroyOutcome> {
    return this.objects.with((objs) => {
      const entry = objs.get(id);
      if (!entry) return err("NotFound", `object ${id} is not mirrored`);
      if (entry.needsIdRemap) {
        objs.delete(id);
        this.clearStaged(id);
        return ok<DestroyOutcome>("local");
      }
      entry.state = "PendingKill";
      return ok<DestroyOutcome>("authority");
    });
  }
}
