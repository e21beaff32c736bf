export const pkg = "@mirrorsync/runtime";

export * from "./config/index";
export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger";
export * from "./authority/index";
export { ReplicationScheduler, type ReplicationSink, type SchedulerOptions, type TickReport } from "./scheduler";
export { SubscriptionRegistry, KNOWN_TABLES } from "./subscriptions";
export { createRuntime, type Runtime, type RuntimeOptions } from "./runtime";
