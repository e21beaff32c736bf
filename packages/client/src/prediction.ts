import type { ObjectId, Transform, Vec3 } from "@mirrorsync/core";
import { Guarded } from "@mirrorsync/utils";

/**
AcceptAny: любой ack перезаписывает lastAcked (может откатиться назад).
MonotonicOnly: принимаются только более новые номера (serial arithmetic, u32). */
export type AckPolicy = "AcceptAny" | "MonotonicOnly";

export interface PredictionState {
  objectId: ObjectId;
  currentSequence: number;
  lastAckedSequence: number;
}

export interface PredictedTransformUpdate {
  objectId: ObjectId;
  sequence: number;
  transform: Transform;
  velocity?: Vec3;
}

const HALF_U32 = 0x8000_0000;

export function isSequenceNewer(a: number, b: number): boolean {
  const d = ((a >>> 0) - (b >>> 0)) >>> 0;
  return d !== 0 && d < HALF_U32;
}

export class PredictionTracker {
  private readonly states = new Guarded(new Map<ObjectId, PredictionState>(), "prediction");

  constructor(readonly policy: AckPolicy = "AcceptAny") {}

  register(id: ObjectId): PredictionState {
    return this.states.with((m) => {
      const s: PredictionState = { objectId: id, currentSequence: 0, lastAckedSequence: 0 };
      m.set(id, s);
      return { ...s };
    });
  }

  unregister(id: ObjectId): boolean {
    return this.states.with((m) => m.delete(id));
  }

  // возвращает текущий номер и сдвигает счётчик (u32 с переполнением)
  nextSequence(id: ObjectId): number | undefined {
    return this.states.with((m) => {
      const s = m.get(id);
      if (!s) return undefined;
      const seq = s.currentSequence;
      s.currentSequence = (seq + 1) >>> 0;
      return seq;
    });
  }

  // true, если ack принят политикой
  processAck(id: ObjectId, sequence: number): boolean {
    const seq = sequence >>> 0;
    return this.states.with((m) => {
      const s = m.get(id);
      if (!s) return false;
      if (this.policy === "MonotonicOnly" && seq !== s.lastAckedSequence && !isSequenceNewer(seq, s.lastAckedSequence)) {
        return false;
      }
      s.lastAckedSequence = seq;
      return true;
    });
  }

  predict(id: ObjectId, transform: Transform, velocity?: Vec3): PredictedTransformUpdate | undefined {
    const sequence = this.nextSequence(id);
    if (sequence === undefined) return undefined;
    return { objectId: id, sequence, transform, ...(velocity ? { velocity } : {}) };
  }

  hasPrediction(id: ObjectId): boolean {
    return this.states.with((m) => m.has(id));
  }

  lastAckedSequence(id: ObjectId): number | undefined {
    return this.states.with((m) => m.get(id)?.lastAckedSequence);
  }

  currentSequence(id: ObjectId): number | undefined {
    return this.states.with((m) => m.get(id)?.currentSequence);
  }

  // переносит состояние под новый id (после remap)
  rekey(from: ObjectId, to: ObjectId): boolean {
    return this.states.with((m) => {
      const s = m.get(from);
      if (!s) return false;
      m.delete(from);
      m.set(to, { ...s, objectId: to });
      return true;
    });
  }

  state(id: ObjectId): PredictionState | undefined {
    return this.states.with((m) => {
      const s = m.get(id);
      return s ? { ...s } : undefined;
    });
  }
}
