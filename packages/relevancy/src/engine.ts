import type { ClientId, ObjectId, RelevancySettings } from "@mirrorsync/core";
import { isTierDue, makePolicy, type RelevancyPolicy } from "./policy";
import type { RelevancySettingsStore } from "./settings";
import type { SpatialIndex } from "./spatial_index";
import type { ZoneId, ZoneRegistry } from "./zones";

// кто подключён и кто чем владеет
export interface ClientDirectory {
  clients(): Iterable<ClientId>;
  ownerOf(object: ObjectId): ClientId | undefined;
}

export type CustomRelevancy = (client: ClientId, object: ObjectId, settings: RelevancySettings) => boolean;

export interface RelevanceView {
  has(object: ObjectId): boolean;
}

export interface RelevancyEngineDeps {
  settings: RelevancySettingsStore;
  zones: ZoneRegistry;
  spatial: SpatialIndex;
  directory: ClientDirectory;
  policy?: Partial<RelevancyPolicy>;
  custom?: CustomRelevancy;
}

const NO_ZONES: ReadonlySet<ZoneId> = new Set();

/**
Кэш релевантности по клиентам. refresh() пересчитывает его целиком:
счётчик тиков, перезагрузка настроек/зон по версиям, затем
для каждого клиента все объекты с настройками, due на этом тике. */
export class RelevancyEngine {
  readonly policy: RelevancyPolicy;
  private tick = 0;
  private cache = new Map<ClientId, Set<ObjectId>>();
  private settingsCache = new Map<ObjectId, RelevancySettings>();
  private zoneCache = new Map<bigint, Set<ZoneId>>();
  private settingsVersion = -1;
  private zonesVersion = -1;
  private requested = new Set<ObjectId>(); // OnDemand и срочные, до следующего refresh
  private dueNow = new Set<ObjectId>(); // запрошенные на текущем тике
  private custom: CustomRelevancy;

  constructor(private readonly deps: RelevancyEngineDeps) {
    this.policy = makePolicy(deps.policy);
    this.custom = deps.custom ?? (() => true);
  }

  get currentTick() {
    return this.tick;
  }

  setCustomPredicate(fn: CustomRelevancy) {
    this.custom = fn;
  }

  requestUpdate(object: ObjectId) {
    this.requested.add(object);
  }

  refresh(): number {
    this.tick = (this.tick + 1) >>> 0;
    this.reloadIfDirty();
    this.dueNow = this.requested;
    this.requested = new Set();

    const due: Array<[ObjectId, RelevancySettings]> = [];
    for (const [id, s] of this.settingsCache) {
      if (s.level === "NeverRelevant") continue;
      if (isTierDue(s.frequency, this.tick) || this.dueNow.has(id)) due.push([id, s]);
    }

    const next = new Map<ClientId, Set<ObjectId>>();
    for (const client of this.deps.directory.clients()) {
      const set = new Set<ObjectId>();
      for (const [id, s] of due) if (this.evaluate(client, id, s)) set.add(id);
      next.set(client, set);
    }
    this.cache = next;
    return this.tick;
  }

  private reloadIfDirty() {
    const { settings, zones } = this.deps;
    if (settings.version !== this.settingsVersion) {
      this.settingsCache = settings.snapshot();
      this.settingsVersion = settings.version;
    }
    if (zones.version !== this.zonesVersion) {
      this.zoneCache = zones.snapshotActiveMemberships();
      this.zonesVersion = zones.version;
    }
  }

  private evaluate(client: ClientId, object: ObjectId, s: RelevancySettings): boolean {
    switch (s.level) {
      case "AlwaysRelevant":
        return true;
      case "NeverRelevant":
        return false;
      case "OwnerOnly":
        return this.deps.directory.ownerOf(object) === client;
      case "SameZone": {
        const cz = this.zoneCache.get(client) ?? NO_ZONES;
        const oz = this.zoneCache.get(object) ?? NO_ZONES;
        const [small, big] = cz.size <= oz.size ? [cz, oz] : [oz, cz];
        for (const z of small) if (big.has(z)) return true;
        return false;
      }
      case "DistanceBased":
        return this.deps.spatial.withinDistance(client, object, s.maxDistance ?? this.policy.defaultMaxDistance);
      case "Custom":
        return this.custom(client, object, s);
    }
  }

  settingsFor(object: ObjectId): RelevancySettings {
    return this.settingsCache.get(object) ?? this.deps.settings.get(object) ?? this.policy.missingSettings;
  }

  // объект без записи настроек оценивается по policy.missingSettings
  private evaluateMissing(client: ClientId, object: ObjectId): boolean {
    const s = this.policy.missingSettings;
    if (s.level === "NeverRelevant") return false;
    if (!isTierDue(s.frequency, this.tick) && !this.dueNow.has(object)) return false;
    return this.evaluate(client, object, s);
  }

  isRelevant(client: ClientId, object: ObjectId): boolean {
    const set = this.cache.get(client);
    if (!set) return this.policy.unknownClientSeesAll;
    if (set.has(object)) return true;
    return !this.settingsCache.has(object) && this.evaluateMissing(client, object);
  }

  relevanceFor(client: ClientId): RelevanceView {
    return { has: (object) => this.isRelevant(client, object) };
  }

  filterRelevant(client: ClientId, objects: Iterable<ObjectId>): ObjectId[] {
    const out: ObjectId[] = [];
    for (const o of objects) if (this.isRelevant(client, o)) out.push(o);
    return out;
  }

  // объекты с настройками, релевантные клиенту на текущем тике
  relevantSet(client: ClientId): ReadonlySet<ObjectId> | undefined {
    return this.cache.get(client);
  }

  relevantClientsFor(object: ObjectId): ClientId[] {
    const out: ClientId[] = [];
    for (const client of this.cache.keys()) if (this.isRelevant(client, object)) out.push(client);
    return out;
  }

  // есть ли у объекта собственные настройки на текущем тике
  hasSettings(object: ObjectId): boolean {
    return this.settingsCache.has(object);
  }

  isDue(object: ObjectId): boolean {
    if (this.dueNow.has(object)) return true;
    const s = this.settingsCache.get(object) ?? this.policy.missingSettings;
    return isTierDue(s.frequency, this.tick);
  }

  forgetClient(client: ClientId) {
    this.cache.delete(client);
  }
}
