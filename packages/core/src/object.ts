import type { ClassId, ClientId, ObjectId } from "./id";
import type { LifecycleState, ObjectInstance } from "./types";

const TRANSITIONS: Record<LifecycleState, ReadonlyArray<LifecycleState>> = {
  Initializing: ["Active", "PendingKill", "PendingDestroy", "Destroyed"],
  Active: ["PendingKill", "PendingDestroy", "Destroyed"],
  PendingKill: ["Destroyed"],
  PendingDestroy: ["Destroyed"],
  Destroyed: [],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export function isAlive(state: LifecycleState): boolean {
  return state === "Initializing" || state === "Active";
}

export function isPendingRemoval(state: LifecycleState): boolean {
  return state === "PendingKill" || state === "PendingDestroy";
}

export class ObjectRegistry {
  private objects = new Map<ObjectId, ObjectInstance>();

  create(
    objectId: ObjectId,
    classId: ClassId,
    className: string,
    now: number,
    ownerId?: ClientId
  ): ObjectInstance {
    const obj: ObjectInstance = {
      objectId,
      classId,
      className,
      state: "Initializing",
      createdAt: now,
      ...(ownerId != null ? { ownerId } : {}),
    };
    this.objects.set(objectId, obj);
    return obj;
  }

  get(id: ObjectId): ObjectInstance | undefined {
    return this.objects.get(id);
  }

  has(id: ObjectId) {
    return this.objects.has(id);
  }

  // false, если переход недопустим (Destroyed терминален)
  setState(id: ObjectId, state: LifecycleState, now: number): boolean {
    const obj = this.objects.get(id);
    if (!obj || !canTransition(obj.state, state)) return false;
    obj.state = state;
    if (state === "Destroyed" && obj.destroyedAt == null) obj.destroyedAt = now;
    return true;
  }

  delete(id: ObjectId): boolean {
    return this.objects.delete(id);
  }

  ownerOf(id: ObjectId): ClientId | undefined {
    return this.objects.get(id)?.ownerId;
  }

  *values(): IterableIterator<ObjectInstance> {
    yield* this.objects.values();
  }

  count() {
    return this.objects.size;
  }
}
