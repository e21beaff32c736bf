export { ConfigSchema, EnvSchema, AckPolicySchema, RelevancySettingsSchema, type Config } from "./schema";
export { makeDefaults, DEV_JWT_SECRET } from "./defaults";
export { loadConfig, summarizeConfig, type LoadOptions } from "./load";
export { readEnvMap, applyEnvOverrides, parseBool, parseIntSafe, deepMerge, type EnvMap } from "./env";
