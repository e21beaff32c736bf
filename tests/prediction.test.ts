import { isSequenceNewer, PredictionTracker } from "@mirrorsync/client";
import type { Transform } from "@mirrorsync/core";

const T: Transform = { position: { x: 1, y: 2, z: 3 }, rotation: { x: 0, y: 0, z: 0, w: 1 }, scale: { x: 1, y: 1, z: 1 } };

test("sequences start at zero and acks overwrite under AcceptAny", () => {
  const p = new PredictionTracker();
  p.register(5n);
  expect([p.nextSequence(5n), p.nextSequence(5n), p.nextSequence(5n)]).toEqual([0, 1, 2]);
  expect(p.processAck(5n, 1)).toBe(true);
  expect(p.lastAckedSequence(5n)).toBe(1);
  expect(p.processAck(5n, 0)).toBe(true);
  expect(p.lastAckedSequence(5n)).toBe(0);
});

test("MonotonicOnly ignores stale acks", () => {
  const p = new PredictionTracker("MonotonicOnly");
  p.register(5n);
  expect(p.processAck(5n, 1)).toBe(true);
  expect(p.processAck(5n, 0)).toBe(false);
  expect(p.lastAckedSequence(5n)).toBe(1);
  expect(p.processAck(5n, 1)).toBe(true);
  expect(p.processAck(5n, 7)).toBe(true);
  expect(p.lastAckedSequence(5n)).toBe(7);
});

test("sequence numbers wrap at 32 bits", () => {
  expect(isSequenceNewer(0, 0xffff_ffff)).toBe(true);
  expect(isSequenceNewer(0xffff_ffff, 0)).toBe(false);
  expect(isSequenceNewer(3, 3)).toBe(false);
  const p = new PredictionTracker("MonotonicOnly");
  p.register(1n);
  expect(p.processAck(1n, 0xffff_ffff)).toBe(true);
  expect(p.processAck(1n, 0)).toBe(true);
  expect(p.lastAckedSequence(1n)).toBe(0);
});

test("unknown objects have no prediction", () => {
  const p = new PredictionTracker();
  expect(p.nextSequence(9n)).toBeUndefined();
  expect(p.processAck(9n, 0)).toBe(false);
  expect(p.predict(9n, T)).toBeUndefined();
});

test("predict stamps transforms with the next sequence", () => {
  const p = new PredictionTracker();
  p.register(2n);
  expect(p.predict(2n, T)).toEqual({ objectId: 2n, sequence: 0, transform: T });
  expect(p.predict(2n, T, { x: 1, y: 0, z: 0 })).toEqual({
    objectId: 2n,
    sequence: 1,
    transform: T,
    velocity: { x: 1, y: 0, z: 0 },
  });
  expect(p.currentSequence(2n)).toBe(2);
});

test("rekey moves state to the new id", () => {
  const p = new PredictionTracker();
  p.register(2n);
  p.nextSequence(2n);
  p.processAck(2n, 0);
  expect(p.rekey(2n, 1000n)).toBe(true);
  expect(p.state(1000n)).toEqual({ objectId: 1000n, currentSequence: 1, lastAckedSequence: 0 });
  expect(p.hasPrediction(2n)).toBe(false);
  expect(p.rekey(2n, 1001n)).toBe(false);
});
