export const pkg = "@mirrorsync/utils";
export function assert(cond: unknown, msg = "Assertion failed"): asserts cond {
  if (!cond) throw new Error(msg);
}

export { Guarded } from "./guarded";
