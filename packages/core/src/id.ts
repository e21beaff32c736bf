export type ObjectId = bigint; // u64: старший бит = временный id клиента
export type ClientId = bigint;
export type EntityId = bigint; // клиент или объект (зоны, пространственный индекс)
export type ClassId = number;

export const NULL_OBJECT_ID: ObjectId = 0n;
export const RESERVED_OBJECT_ID_MAX: ObjectId = 999n;
export const TEMP_ID_BIT: bigint = 1n << 63n;
export const U64_MASK: bigint = (1n << 64n) - 1n;

export function isTemporaryId(id: ObjectId): boolean {
  return (id & TEMP_ID_BIT) !== 0n;
}

export function isValidObjectId(id: ObjectId): boolean {
  return id > NULL_OBJECT_ID && id <= U64_MASK;
}

export interface TempIdSource {
  now(): number;
  random32(): number;
}

export const defaultTempIdSource: TempIdSource = {
  now: () => Date.now(),
  random32: () => Math.floor(Math.random() * 0x1_0000_0000) >>> 0,
};

/**
Временный id: время XOR (32 случайных бита << 32), старший бит выставлен.
С id авторитета не пересекается. */
export function makeTemporaryId(src: TempIdSource = defaultTempIdSource): ObjectId {
  const ts = BigInt(Math.max(0, Math.floor(src.now()))) & U64_MASK;
  const rnd = BigInt(src.random32() >>> 0) << 32n;
  return ((ts ^ rnd) | TEMP_ID_BIT) & U64_MASK;
}

// последовательные id авторитета, 1..999 зарезервированы
export class ObjectIdAllocator {
  private next: ObjectId;

  constructor(first: ObjectId = RESERVED_OBJECT_ID_MAX + 1n) {
    this.next = first > RESERVED_OBJECT_ID_MAX ? first : RESERVED_OBJECT_ID_MAX + 1n;
  }

  allocate(): ObjectId {
    const id = this.next;
    this.next += 1n;
    if (isTemporaryId(id)) throw new Error("authority object id space exhausted");
    return id;
  }

  peek(): ObjectId {
    return this.next;
  }
}

export function parseObjectId(raw: string | number | bigint): ObjectId | null {
  try {
    const v =
      typeof raw === "bigint"
        ? raw
        : typeof raw === "number"
          ? Number.isSafeInteger(raw)
            ? BigInt(raw)
            : null
          : /^\d+$/.test(raw.trim())
            ? BigInt(raw.trim())
            : null;
    if (v == null || v < 0n || v > U64_MASK) return null;
    return v;
  } catch {
    return null;
  }
}
