import { assert } from "@mirrorsync/utils";
import { err, ok, type Result } from "./errors";
import type { ClassId } from "./id";
import type {
  ClassDefinition,
  PropertyConstraint,
  PropertyDefinition,
  PropertyType,
  ReplicationCondition,
} from "./types";

export interface PropertySpec {
  name: string;
  type: PropertyType;
  replicated?: boolean;
  condition?: ReplicationCondition;
  readonly?: boolean;
  flags?: number;
  constraint?: PropertyConstraint;
}

export interface ClassSpec {
  name: string;
  parent?: string;
  replicates?: boolean;
  properties?: ReadonlyArray<PropertySpec>;
}

export const DEFAULT_FIRST_CLASS_ID = 100;
export const ACTOR_CLASS = "Actor";

/**
Реестр классов и их свойств. Свойства наследуются по цепочке parent,
определение в наследнике перекрывает родительское. */
export class ClassRegistry {
  private nameToId = new Map<string, ClassId>();
  private defs = new Map<ClassId, ClassDefinition>();
  private props = new Map<ClassId, Map<string, PropertyDefinition>>();
  private nextId: ClassId;

  constructor(firstClassId = DEFAULT_FIRST_CLASS_ID, withActor = true) {
    this.nextId = firstClassId;
    if (withActor) {
      const r = this.defineClass({
        name: ACTOR_CLASS,
        properties: [
          { name: "Location", type: "Vector" },
          { name: "Rotation", type: "Quat" },
          { name: "Scale", type: "Vector" },
          { name: "ActorName", type: "Name" },
        ],
      });
      assert(r.ok, "failed to define Actor");
    }
  }

  defineClass(spec: ClassSpec): Result<ClassDefinition> {
    if (this.nameToId.has(spec.name)) return err("AlreadyExists", `class ${spec.name} already registered`);
    let parentId: ClassId | undefined;
    if (spec.parent != null) {
      parentId = this.nameToId.get(spec.parent);
      if (parentId == null) return err("NotFound", `parent class ${spec.parent} not found`);
    }
    const seen = new Set<string>();
    for (const p of spec.properties ?? []) {
      if (seen.has(p.name)) return err("AlreadyExists", `property ${spec.name}.${p.name} declared twice`);
      seen.add(p.name);
    }

    const def: ClassDefinition = {
      classId: this.nextId++,
      name: spec.name,
      replicates: spec.replicates ?? true,
      ...(parentId != null ? { parentId } : {}),
    };
    this.nameToId.set(def.name, def.classId);
    this.defs.set(def.classId, def);
    this.props.set(def.classId, new Map());
    for (const p of spec.properties ?? []) this.insertProperty(def, p);
    return ok(def);
  }

  defineProperty(className: string, spec: PropertySpec): Result<PropertyDefinition> {
    const id = this.nameToId.get(className);
    const def = id == null ? undefined : this.defs.get(id);
    if (!def) return err("NotFound", `class ${className} not found`);
    if (this.props.get(def.classId)?.has(spec.name)) {
      return err("AlreadyExists", `property ${className}.${spec.name} already registered`);
    }
    return ok(this.insertProperty(def, spec));
  }

  private insertProperty(cls: ClassDefinition, spec: PropertySpec): PropertyDefinition {
    const pd: PropertyDefinition = {
      className: cls.name,
      name: spec.name,
      type: spec.type,
      replicated: spec.replicated ?? true,
      condition: spec.condition ?? "OnChange",
      readonly: spec.readonly ?? false,
      flags: spec.flags ?? 0,
      ...(spec.constraint ? { constraint: spec.constraint } : {}),
    };
    let m = this.props.get(cls.classId);
    if (!m) {
      m = new Map();
      this.props.set(cls.classId, m);
    }
    m.set(pd.name, pd);
    return pd;
  }

  getClass(id: ClassId): ClassDefinition | undefined {
    return this.defs.get(id);
  }

  getClassByName(name: string): ClassDefinition | undefined {
    const id = this.nameToId.get(name);
    return id == null ? undefined : this.defs.get(id);
  }

  /** Цепочка от класса к корню. */
  lineage(id: ClassId): ClassDefinition[] {
    const out: ClassDefinition[] = [];
    const guard = new Set<ClassId>();
    let cur = this.defs.get(id);
    while (cur && !guard.has(cur.classId)) {
      guard.add(cur.classId);
      out.push(cur);
      cur = cur.parentId != null ? this.defs.get(cur.parentId) : undefined;
    }
    return out;
  }

  isA(id: ClassId, ancestor: string): boolean {
    return this.lineage(id).some((c) => c.name === ancestor);
  }

  getProperty(classId: ClassId, name: string): PropertyDefinition | undefined {
    for (const c of this.lineage(classId)) {
      const pd = this.props.get(c.classId)?.get(name);
      if (pd) return pd;
    }
    return undefined;
  }

  // свои + унаследованные, наследник перекрывает родителя
  properties(classId: ClassId): PropertyDefinition[] {
    const merged = new Map<string, PropertyDefinition>();
    const chain = this.lineage(classId).reverse();
    for (const c of chain) {
      for (const pd of this.props.get(c.classId)?.values() ?? []) merged.set(pd.name, pd);
    }
    return [...merged.values()];
  }

  replicatedProperties(classId: ClassId): PropertyDefinition[] {
    return this.properties(classId).filter((p) => p.replicated);
  }

  classes(): ClassDefinition[] {
    return [...this.defs.values()];
  }

  count() {
    return this.defs.size;
  }
}
