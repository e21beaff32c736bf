import { z } from "zod";

export const EnvSchema = z.enum(["dev", "prod", "test"]);

export const RelevancyLevelSchema = z.enum([
  "AlwaysRelevant",
  "OwnerOnly",
  "DistanceBased",
  "SameZone",
  "Custom",
  "NeverRelevant",
]);
export const UpdateFrequencySchema = z.enum(["High", "Medium", "Low", "OnDemand"]);
export const NetworkPrioritySchema = z.enum(["Critical", "High", "Normal", "Low"]);

export const RelevancySettingsSchema = z.object({
  level: RelevancyLevelSchema,
  frequency: UpdateFrequencySchema,
  priority: NetworkPrioritySchema,
  maxDistance: z.number().positive().optional(),
});

export const AckPolicySchema = z.enum(["AcceptAny", "MonotonicOnly"]);

export const ConfigSchema = z.object({
  env: EnvSchema,

  server: z.object({
    host: z.string().min(1),
    port: z.number().int().positive(),
    restPrefix: z.string().min(1),
    adminPrefix: z.string().min(1),
    corsOrigins: z.array(z.string()).default(["*"]),
  }),

  replication: z.object({
    tickHz: z.number().int().positive().max(1000),
    tombstoneRetentionMs: z.number().int().nonnegative(),
    firstObjectId: z.number().int().min(1000),
    firstClassId: z.number().int().positive(),
  }),

  relevancy: z.object({
    defaultMaxDistance: z.number().positive(),
    cellSize: z.number().positive(),
    unknownClientSeesAll: z.boolean(),
    missingSettings: RelevancySettingsSchema,
  }),

  prediction: z.object({
    ackPolicy: AckPolicySchema,
  }),

  logs: z.object({
    json: z.boolean(),
    pretty: z.boolean(),
    level: z.enum(["debug", "info", "warn", "error"]),
  }),

  auth: z.object({
    jwt: z.object({
      algorithm: z.literal("HS256"),
      secret: z.string().min(1),
      issuer: z.string().min(1),
      accessTtl: z.string().min(1),
    }),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
