export { ChangeTracker, type ObjectDelta } from "./change_tracker";
export { SnapshotBuilder, type CustomCondition, type SnapshotBuilderDeps } from "./snapshot_builder";
export { ReplicationQueue } from "./replication_queue";
export {
  AuthorityContext,
  type AuthorityOptions,
  type ClientSession,
  type ObjectView,
  type SweepResult,
} from "./context";
