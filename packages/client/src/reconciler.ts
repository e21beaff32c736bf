import {
  CallbackRegistry,
  formatError,
  type ObjectId,
  type ReplicationBatch,
  type ReplicationError,
  type Result,
} from "@mirrorsync/core";
import type { SpawnResponse } from "@mirrorsync/net";
import { silentLogger, type Logger } from "@mirrorsync/runtime";
import type { ClientMirror, DestroyOutcome, LocalCreateParams } from "./mirror";
import type { PredictionTracker } from "./prediction";

export type RemapCallback = (tempId: ObjectId, serverId: ObjectId) => void;

export interface ReconcilerDeps {
  mirror: ClientMirror;
  prediction: PredictionTracker;
  logger?: Logger;
}

/**
Связывает временные id оптимистично созданных объектов с id авторитета.
Колбэки onObjectIdRemapped вызываются уже после выхода из критической
секции, поэтому могут читать зеркало. */
export class IdentityReconciler {
  readonly onObjectIdRemapped = new CallbackRegistry<[ObjectId, ObjectId]>();
  private readonly mirror: ClientMirror;
  private readonly prediction: PredictionTracker;
  private readonly log: Logger;

  constructor(deps: ReconcilerDeps) {
    this.mirror = deps.mirror;
    this.prediction = deps.prediction;
    this.log = deps.logger ?? silentLogger;
  }

  // оптимистичное создание; предсказание регистрируется сразу
  createLocal(className: string, params: LocalCreateParams = {}): ObjectId {
    const id = this.mirror.createLocal(className, params);
    this.prediction.register(id);
    return id;
  }

  remap(tempId: ObjectId, serverId: ObjectId): Result<void> {
    const r = this.mirror.remapEntry(tempId, serverId);
    if (!r.ok) {
      this.log.debug("remap refused", { tempId, serverId, error: formatError(r.error) });
      return r;
    }
    this.prediction.rekey(tempId, serverId);
    this.onObjectIdRemapped.emit(tempId, serverId);
    return r;
  }

  reportCreationFailed(tempId: ObjectId, error: ReplicationError | string): Result<void> {
    const r = this.mirror.discardPending(tempId);
    if (!r.ok) return r;
    this.prediction.unregister(tempId);
    this.log.warn("optimistic creation failed", {
      tempId,
      error: typeof error === "string" ? error : formatError(error),
    });
    return r;
  }

  destroy(id: ObjectId): Result<DestroyOutcome> {
    const r = this.mirror.destroyEntry(id);
    if (r.ok && r.data === "local") this.prediction.unregister(id);
    return r;
  }

  handleSpawnResponse(tempId: ObjectId, response: SpawnResponse): Result<void> {
    if (response.objectId === 0n) {
      return this.reportCreationFailed(tempId, response.error ?? "spawn failed");
    }
    return this.remap(tempId, response.objectId);
  }

  // применяет пакет репликации к зеркалу; надгробия снимают и предсказания
  applyBatch(batch: ReplicationBatch): { applied: number; removed: number } {
    let applied = 0;
    let removed = 0;
    for (const s of batch.snapshots) {
      this.mirror.apply(s);
      applied++;
    }
    for (const id of batch.tombstones) {
      if (this.mirror.applyTombstone(id)) removed++;
      this.prediction.unregister(id);
    }
    return { applied, removed };
  }

  pendingRemaps(): ObjectId[] {
    return this.mirror.pendingRemaps();
  }
}
