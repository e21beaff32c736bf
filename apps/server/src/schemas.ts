import { z } from "zod";
import { PROPERTY_TYPES } from "@mirrorsync/core";
import { RelevancySettingsSchema } from "@mirrorsync/runtime";

export const LoginSchema = z.object({
  client_id: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]),
  role: z.enum(["user", "admin"]).default("user"),
});

export const PositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const ReplicationConditionSchema = z.enum(["Always", "OnChange", "Initial", "OwnerOnly", "ServerOnly", "Custom"]);

export const PropertySpecSchema = z.object({
  name: z.string().min(1),
  type: z.enum(PROPERTY_TYPES),
  replicated: z.boolean().optional(),
  condition: ReplicationConditionSchema.optional(),
  readonly: z.boolean().optional(),
  flags: z.number().int().nonnegative().optional(),
  constraint: z
    .object({
      min: z.number().optional(),
      max: z.number().optional(),
      allowed: z.array(z.union([z.string(), z.number()])).optional(),
      required: z.boolean().optional(),
    })
    .optional(),
});

export const ClassSpecSchema = z.object({
  name: z.string().min(1),
  parent: z.string().min(1).optional(),
  replicates: z.boolean().optional(),
  properties: z.array(PropertySpecSchema).default([]),
});

export const ZoneCreateSchema = z.object({
  name: z.string().min(1),
  active: z.boolean().default(true),
});

export const ZonePatchSchema = z.object({
  name: z.string().min(1).optional(),
  active: z.boolean().optional(),
});

export const ZoneMemberSchema = z.object({
  entity_id: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]),
  is_client: z.boolean().default(false),
});

export const SubscriptionBodySchema = z.object({
  type: z.enum(["subscribe", "unsubscribe"]),
  table: z.string().min(1),
});

export { RelevancySettingsSchema };
