export const pkg = "@mirrorsync/client";

export {
  ClientMirror,
  type MirrorEntry,
  type LocalCreateParams,
  type DestroyOutcome,
  type ClientMirrorOptions,
} from "./mirror";
export {
  PredictionTracker,
  isSequenceNewer,
  type AckPolicy,
  type PredictionState,
  type PredictedTransformUpdate,
} from "./prediction";
export { IdentityReconciler, type RemapCallback, type ReconcilerDeps } from "./reconciler";
export { createMirrorClient, type MirrorClient, type MirrorClientOptions } from "./client";
