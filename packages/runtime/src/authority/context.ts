import {
  CallbackRegistry,
  ClassRegistry,
  err,
  formatError,
  isAlive,
  isPendingRemoval,
  ObjectIdAllocator,
  ObjectRegistry,
  ok,
  PropertyStore,
  validateProperty,
  type Caller,
  type ClientId,
  type ObjectId,
  type ObjectInstance,
  type PropertyDefinition,
  type PropertyValue,
  type RelevancySettings,
  type ReplicationError,
  type ErrorKind,
  type Result,
  type Vec3,
} from "@mirrorsync/core";
import { deserializeProperty, type CodecAnomaly, type SpawnRequest, type SpawnResponse } from "@mirrorsync/net";
import {
  RelevancyEngine,
  RelevancySettingsStore,
  SpatialIndex,
  ZoneRegistry,
  type CustomRelevancy,
  type RelevancyPolicy,
} from "@mirrorsync/relevancy";
import { silentLogger, type Logger } from "../logger";
import { ChangeTracker } from "./change_tracker";
import { ReplicationQueue } from "./replication_queue";
import { SnapshotBuilder, type CustomCondition } from "./snapshot_builder";

function denial(kind: ErrorKind, message: string): ReplicationError {
  return { kind, message };
}

export interface AuthorityOptions {
  firstObjectId?: ObjectId;
  firstClassId?: number;
  cellSize?: number;
  policy?: Partial<RelevancyPolicy>;
  customRelevancy?: CustomRelevancy;
  customCondition?: CustomCondition;
  logger?: Logger;
  clock?: () => number;
}

export interface ClientSession {
  clientId: ClientId;
  admin: boolean;
  connectedAt: number;
}

export interface ObjectView {
  object: ObjectInstance;
  properties: Map<string, PropertyValue>;
  relevancy: RelevancySettings;
}

export interface SweepResult {
  destroyed: ObjectId[];
  purged: ObjectId[];
}

/**
Всё состояние авторитета в одном объекте: классы, объекты, свойства,
релевантность, трекер изменений. Каждая операция синхронна и либо
применяется целиком, либо ничего не меняет. */
export class AuthorityContext {
  readonly classes: ClassRegistry;
  readonly objects = new ObjectRegistry();
  readonly store = new PropertyStore();
  readonly settings = new RelevancySettingsStore();
  readonly zones = new ZoneRegistry();
  readonly spatial: SpatialIndex;
  readonly engine: RelevancyEngine;
  readonly tracker = new ChangeTracker();
  readonly builder: SnapshotBuilder;
  readonly queue = new ReplicationQueue();

  readonly onClientDisconnected = new CallbackRegistry<[ClientId]>();
  readonly onObjectPurged = new CallbackRegistry<[ObjectId]>();

  private readonly ids: ObjectIdAllocator;
  private readonly sessions = new Map<ClientId, ClientSession>();
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(opts: AuthorityOptions = {}) {
    this.log = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? (() => Date.now());
    this.ids = new ObjectIdAllocator(opts.firstObjectId);
    this.classes = new ClassRegistry(opts.firstClassId);
    this.spatial = new SpatialIndex(opts.cellSize);
    this.engine = new RelevancyEngine({
      settings: this.settings,
      zones: this.zones,
      spatial: this.spatial,
      directory: {
        clients: () => this.sessions.keys(),
        ownerOf: (id) => this.objects.ownerOf(id),
      },
      ...(opts.policy ? { policy: opts.policy } : {}),
      ...(opts.customRelevancy ? { custom: opts.customRelevancy } : {}),
    });
    this.builder = new SnapshotBuilder({
      classes: this.classes,
      objects: this.objects,
      store: this.store,
      tracker: this.tracker,
      priorityOf: (id) => this.engine.settingsFor(id).priority,
      ...(opts.customCondition ? { customCondition: opts.customCondition } : {}),
    });
  }

  // ---------- клиенты ----------

  connectClient(clientId: ClientId, opts: { admin?: boolean } = {}): Result<ClientSession> {
    if (this.sessions.has(clientId)) return err("AlreadyExists", `client ${clientId} already connected`);
    const session: ClientSession = { clientId, admin: opts.admin ?? false, connectedAt: this.clock() };
    this.sessions.set(clientId, session);
    this.zones.addClientToDefaultZones(clientId);
    this.log.info("client connected", { clientId, admin: session.admin });
    return ok(session);
  }

  disconnectClient(clientId: ClientId): Result<void> {
    if (!this.sessions.delete(clientId)) return err("NotFound", `client ${clientId} is not connected`);
    this.zones.removeFromAllZones(clientId);
    this.spatial.remove(clientId);
    this.engine.forgetClient(clientId);
    this.onClientDisconnected.emit(clientId);
    this.log.info("client disconnected", { clientId });
    return ok(undefined);
  }

  session(clientId: ClientId): ClientSession | undefined {
    return this.sessions.get(clientId);
  }

  clients(): ClientId[] {
    return [...this.sessions.keys()];
  }

  updateClientPosition(clientId: ClientId, p: Vec3): Result<void> {
    if (!this.sessions.has(clientId)) return err("NotFound", `client ${clientId} is not connected`);
    this.spatial.update(clientId, p);
    return ok(undefined);
  }

  // ---------- объекты ----------

  private canModify(sender: Caller, obj: ObjectInstance) {
    return sender.admin || obj.ownerId == null || obj.ownerId === sender.clientId;
  }

  private liveObject(id: ObjectId): Result<ObjectInstance> {
    const obj = this.objects.get(id);
    if (!obj || obj.state === "Destroyed") return err("NotFound", `object ${id} does not exist`);
    return ok(obj);
  }

  private decodeFor(def: PropertyDefinition, json: string): Result<PropertyValue> {
    const decoded = deserializeProperty(json, {
      onAnomaly: (a: CodecAnomaly) =>
        this.log.warn("property codec anomaly", { property: `${def.className}.${def.name}`, ...a }),
    });
    if (!decoded.ok) return decoded;
    return validateProperty(def, decoded.data);
  }

  private rejected(op: string, error: ReplicationError): { ok: false; error: ReplicationError } {
    this.log.warn(`${op} rejected`, { error: formatError(error) });
    return { ok: false, error };
  }

  spawn(sender: Caller, req: SpawnRequest): SpawnResponse {
    const r = this.spawnObject(sender, req);
    if (!r.ok) {
      this.rejected("spawn", r.error);
      return { objectId: 0n, error: formatError(r.error) };
    }
    return { objectId: r.data.objectId };
  }

  spawnObject(sender: Caller, req: SpawnRequest): Result<ObjectInstance> {
    const cls = this.classes.getClass(req.class_id);
    if (!cls) return err("NotFound", `class ${req.class_id} does not exist`);

    // сначала всё декодируем и проверяем, потом пишем
    const staged: Array<[string, PropertyValue]> = [];
    const transformProps: Array<[string, PropertyValue]> = [
      ["Location", { type: "Vector", value: { x: req.position[0], y: req.position[1], z: req.position[2] } }],
      ["Rotation", { type: "Quat", value: { x: req.rotation[0], y: req.rotation[1], z: req.rotation[2], w: req.rotation[3] } }],
      ["Scale", { type: "Vector", value: { x: req.scale[0], y: req.scale[1], z: req.scale[2] } }],
      ["ActorName", { type: "Name", value: req.actor_name }],
    ];
    for (const [name, value] of transformProps) {
      const def = this.classes.getProperty(cls.classId, name);
      if (!def) continue;
      const v = validateProperty(def, value);
      if (!v.ok) return v;
      staged.push([name, v.data]);
    }
    const seen = new Set<string>();
    for (const [name, json] of req.initial_properties) {
      if (seen.has(name)) return err("AlreadyExists", `initial property ${name} given twice`);
      seen.add(name);
      const def = this.classes.getProperty(cls.classId, name);
      if (!def) return err("NotFound", `property ${cls.name}.${name} is not defined`);
      const v = this.decodeFor(def, json);
      if (!v.ok) return v;
      staged.push([name, v.data]);
    }
    for (const def of this.classes.properties(cls.classId)) {
      if (def.constraint?.required && !staged.some(([n]) => n === def.name)) {
        return err("ValidationFailed", `${def.className}.${def.name} is required`);
      }
    }

    const now = this.clock();
    const id = this.ids.allocate();
    const obj = this.objects.create(id, cls.classId, cls.name, now, sender.clientId);
    for (const [name, value] of staged) {
      this.store.set(id, name, value);
      this.spatial.updateFromProperty(id, name, value);
    }
    this.objects.setState(id, "Active", now);
    this.tracker.recordNew(id);
    this.log.debug("object spawned", { objectId: id, className: cls.name, owner: sender.clientId });
    return ok(obj);
  }

  setProperty(sender: Caller, objectId: ObjectId, name: string, wireJson: string): Result<PropertyValue> {
    const r = this.setPropertyInner(sender, objectId, name, wireJson);
    return r.ok ? r : this.rejected("setProperty", r.error);
  }

  private setPropertyInner(sender: Caller, objectId: ObjectId, name: string, wireJson: string): Result<PropertyValue> {
    const live = this.liveObject(objectId);
    if (!live.ok) return live;
    const obj = live.data;
    const def = this.classes.getProperty(obj.classId, name);
    if (!def) return err("NotFound", `property ${obj.className}.${name} is not defined`);
    if (!this.canModify(sender, obj)) {
      return err("PermissionDenied", `client ${sender.clientId} may not modify object ${objectId}`);
    }
    if (def.readonly && !sender.admin) return err("PermissionDenied", `${def.className}.${name} is read-only`);
    const v = this.decodeFor(def, wireJson);
    if (!v.ok) return v;
    return ok(this.writeProperty(obj, name, v.data));
  }

  // запись уже проверенного значения
  private writeProperty(obj: ObjectInstance, name: string, value: PropertyValue): PropertyValue {
    const now = this.clock();
    this.store.set(obj.objectId, name, value);
    this.tracker.recordChange(obj.objectId, name, value);
    const priority = this.engine.settingsFor(obj.objectId).priority;
    this.queue.enqueue({
      objectId: obj.objectId,
      propertyName: name,
      timestamp: now,
      highPriority: priority === "Critical" || priority === "High",
    });
    this.spatial.updateFromProperty(obj.objectId, name, value);
    return value;
  }

  destroy(sender: Caller, objectId: ObjectId): Result<void> {
    const live = this.liveObject(objectId);
    if (!live.ok) return this.rejected("destroy", live.error);
    const obj = live.data;
    if (!this.canModify(sender, obj)) {
      return this.rejected("destroy", denial("PermissionDenied", `client ${sender.clientId} may not destroy ${objectId}`));
    }
    if (isPendingRemoval(obj.state)) return ok(undefined);
    this.objects.setState(objectId, "PendingDestroy", this.clock());
    this.tracker.recordDestroyed(objectId);
    return ok(undefined);
  }

  forceDestroy(sender: Caller, objectId: ObjectId): Result<void> {
    if (!sender.admin) return this.rejected("forceDestroy", denial("PermissionDenied", "forceDestroy requires admin"));
    const live = this.liveObject(objectId);
    if (!live.ok) return this.rejected("forceDestroy", live.error);
    this.objects.setState(objectId, "Destroyed", this.clock());
    this.tracker.recordDestroyed(objectId);
    return ok(undefined);
  }

  setRelevancy(sender: Caller, objectId: ObjectId, s: RelevancySettings): Result<RelevancySettings> {
    const live = this.liveObject(objectId);
    if (!live.ok) return this.rejected("setRelevancy", live.error);
    if (!this.canModify(sender, live.data)) {
      return this.rejected("setRelevancy", denial("PermissionDenied", `client ${sender.clientId} may not change ${objectId}`));
    }
    if (s.maxDistance != null && !(Number.isFinite(s.maxDistance) && s.maxDistance > 0)) {
      return this.rejected("setRelevancy", denial("ValidationFailed", "maxDistance must be a positive number"));
    }
    this.settings.set(objectId, s);
    return ok(s);
  }

  getObject(id: ObjectId): ObjectView | undefined {
    const object = this.objects.get(id);
    if (!object) return undefined;
    return {
      object: { ...object },
      properties: new Map(this.store.all(id)),
      relevancy: this.engine.settingsFor(id),
    };
  }

  /**
  PendingDestroy/PendingKill -> Destroyed; Destroyed старше retentionMs
  удаляются вместе со свойствами, настройками, зонами и позицией. */
  sweepLifecycle(now: number, retentionMs: number): SweepResult {
    const destroyed: ObjectId[] = [];
    const purged: ObjectId[] = [];
    for (const obj of [...this.objects.values()]) {
      if (isPendingRemoval(obj.state)) {
        this.objects.setState(obj.objectId, "Destroyed", now);
        destroyed.push(obj.objectId);
      } else if (obj.state === "Destroyed" && now - (obj.destroyedAt ?? now) >= retentionMs) {
        this.purge(obj.objectId);
        purged.push(obj.objectId);
      }
    }
    if (purged.length) this.log.debug("objects purged", { count: purged.length });
    return { destroyed, purged };
  }

  private purge(id: ObjectId) {
    this.objects.delete(id);
    this.store.deleteObject(id);
    this.settings.remove(id);
    this.zones.removeFromAllZones(id);
    this.spatial.remove(id);
    this.onObjectPurged.emit(id);
  }

  liveObjects(): ObjectInstance[] {
    return [...this.objects.values()].filter((o) => isAlive(o.state));
  }
}
