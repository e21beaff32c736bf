import { Hono, type Context, type MiddlewareHandler } from "hono";
import { bodyLimit } from "hono/body-limit";
import {
  ERROR_HTTP_STATUS,
  parseObjectId,
  type Caller,
  type ObjectId,
  type ReplicationError,
} from "@mirrorsync/core";
import { encodeProperty, encodeSpawnResponse, SpawnRequestSchema } from "@mirrorsync/net";
import type { Zone } from "@mirrorsync/relevancy";
import {
  createRuntime,
  SubscriptionRegistry,
  summarizeConfig,
  type Config,
  type Logger,
  type Runtime,
} from "@mirrorsync/runtime";
import type { z } from "zod";
import { bearerToken, createAuth, type Auth } from "./auth";
import { Outbox } from "./outbox";
import {
  ClassSpecSchema,
  LoginSchema,
  PositionSchema,
  RelevancySettingsSchema,
  SubscriptionBodySchema,
  ZoneCreateSchema,
  ZoneMemberSchema,
  ZonePatchSchema,
} from "./schemas";

export const SERVER_VERSION = "0.1.0";
const REST_BODY_LIMIT = 64 * 1024;

type AppEnv = { Variables: { caller: Caller } };
type Ctx = Context<AppEnv>;

// bigint -> число, если помещается, иначе строка; Map -> объект
function replacer(_key: string, value: unknown) {
  if (typeof value === "bigint") {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}

function jsonOk(data: unknown, http = 200) {
  return new Response(JSON.stringify({ ok: true, data }, replacer), {
    status: http,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

function jsonErr(code: string, message: string, http = 400) {
  return new Response(JSON.stringify({ ok: false, error: { code, message } }), {
    status: http,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

function fail(e: ReplicationError) {
  return jsonErr(e.kind, e.message, ERROR_HTTP_STATUS[e.kind]);
}

function invalid(error: z.ZodError) {
  const msg = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
  return jsonErr("bad_request", msg, 400);
}

async function readJson(c: Ctx): Promise<unknown> {
  return c.req.json().catch(() => null);
}

function idParam(c: Ctx, name: string): ObjectId | null {
  return parseObjectId(c.req.param(name) ?? "");
}

function zoneParam(c: Ctx): number | null {
  const raw = c.req.param("zoneId") ?? "";
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

function zoneJson(z: Zone) {
  return { zone_id: z.zoneId, name: z.name, active: z.active, owner_id: z.ownerId ?? null };
}

export interface ServerOptions {
  logger?: Logger;
  clock?: () => number;
  outboxLimit?: number;
}

export interface Server {
  app: Hono<AppEnv>;
  runtime: Runtime;
  outbox: Outbox;
  auth: Auth;
}

/**
Авторитет + REST-поверхность над ним. Маршруты v1 требуют access-токен,
admin-маршруты роль admin. Тики сюда не входят: их запускает вызывающий
(таймер в index.ts, ручной /tick, тесты). */
export function createServer(cfg: Config, opt: ServerOptions = {}): Server {
  const subscriptions = new SubscriptionRegistry();
  const outbox = new Outbox(subscriptions, opt.outboxLimit, opt.logger?.child("outbox"));
  const runtime = createRuntime(cfg, {
    subscriptions,
    sink: (batch) => outbox.push(batch),
    ...(opt.logger ? { logger: opt.logger } : {}),
    ...(opt.clock ? { clock: opt.clock } : {}),
  });
  const { authority, scheduler } = runtime;
  const auth = createAuth(cfg.auth.jwt, opt.clock);
  const log = runtime.log.child("http");
  const clock = opt.clock ?? (() => Date.now());

  authority.onClientDisconnected.on((client) => outbox.forget(client));

  const app = new Hono<AppEnv>();

  // CORS + preflight
  app.use("*", async (c, next) => {
    const origin = c.req.header("origin") ?? null;
    const any = cfg.server.corsOrigins.includes("*");
    const allow = origin && (any || cfg.server.corsOrigins.includes(origin)) ? (any ? "*" : origin) : null;
    if (c.req.method === "OPTIONS") {
      const res = new Response(null, { status: 204 });
      if (allow) {
        res.headers.set("access-control-allow-origin", allow);
        res.headers.set("access-control-allow-headers", "authorization, content-type");
        res.headers.set("access-control-allow-methods", "GET, POST, PUT, PATCH, DELETE, OPTIONS");
      }
      return res;
    }
    await next();
    if (allow) c.res.headers.set("access-control-allow-origin", allow);
  });

  app.use(
    "*",
    bodyLimit({ maxSize: REST_BODY_LIMIT, onError: () => jsonErr("body_too_large", "Body exceeds 64KiB", 413) })
  );

  const requireAccess: MiddlewareHandler<AppEnv> = async (c, next) => {
    const token = bearerToken(c.req.raw);
    if (!token) return jsonErr("unauthorized", "Missing token", 401);
    const caller = await auth.verify(token);
    if (!caller) return jsonErr("unauthorized", "Invalid token", 401);
    c.set("caller", caller);
    await next();
  };

  const requireAdmin: MiddlewareHandler<AppEnv> = async (c, next) => {
    const caller = await auth.verify(bearerToken(c.req.raw));
    if (!caller) return jsonErr("unauthorized", "Missing or invalid token", 401);
    if (!caller.admin) return jsonErr("forbidden", "Admin required", 403);
    c.set("caller", caller);
    await next();
  };

  const v1 = `${cfg.server.restPrefix}/v1`;
  const admin = cfg.server.adminPrefix;

  app.get(`${v1}/server/info`, () =>
    jsonOk({
      version: SERVER_VERSION,
      env: cfg.env,
      tickHz: cfg.replication.tickHz,
      tick: authority.engine.currentTick,
      clients: authority.clients().length,
      objects: authority.liveObjects().length,
      classes: authority.classes.count(),
    })
  );

  // в prod роль admin через логин не выдаётся
  app.post(`${v1}/auth/login`, async (c) => {
    const body = LoginSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const clientId = parseObjectId(body.data.client_id);
    if (clientId == null) return jsonErr("bad_request", "invalid client_id", 400);
    if (body.data.role === "admin" && cfg.env === "prod") {
      return jsonErr("forbidden", "admin tokens are not issued by login in prod", 403);
    }
    const accessToken = await auth.sign({ sub: clientId.toString(), role: body.data.role });
    return jsonOk({ clientId, role: body.data.role, accessToken, accessExpiresIn: auth.accessTtl });
  });

  // ---------- сессия ----------

  app.post(`${v1}/session`, requireAccess, (c) => {
    const caller = c.get("caller");
    const r = authority.connectClient(caller.clientId, { admin: caller.admin });
    if (!r.ok) return fail(r.error);
    subscriptions.subscribeAll(caller.clientId);
    return jsonOk(r.data, 201);
  });

  app.delete(`${v1}/session`, requireAccess, (c) => {
    const r = authority.disconnectClient(c.get("caller").clientId);
    return r.ok ? jsonOk(null) : fail(r.error);
  });

  app.put(`${v1}/session/position`, requireAccess, async (c) => {
    const body = PositionSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const r = authority.updateClientPosition(c.get("caller").clientId, body.data);
    return r.ok ? jsonOk(body.data) : fail(r.error);
  });

  app.post(`${v1}/subscriptions`, requireAccess, async (c) => {
    const body = SubscriptionBodySchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const r = subscriptions.apply({ ...body.data, client_id: c.get("caller").clientId });
    return r.ok ? jsonOk({ tables: [...r.data].sort() }) : fail(r.error);
  });

  app.get(`${v1}/updates`, requireAccess, (c) => jsonOk({ envelopes: outbox.drain(c.get("caller").clientId) }));

  // ---------- объекты ----------

  app.post(`${v1}/objects`, requireAccess, async (c) => {
    const body = SpawnRequestSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const res = authority.spawn(c.get("caller"), body.data);
    return new Response(JSON.stringify(encodeSpawnResponse(res)), {
      status: res.objectId === 0n ? 422 : 201,
      headers: { "content-type": "application/json; charset=utf-8" },
    });
  });

  app.get(`${v1}/objects/:id`, requireAccess, (c) => {
    const id = idParam(c, "id");
    if (id == null) return jsonErr("bad_request", "invalid object id", 400);
    const caller = c.get("caller");
    const view = authority.getObject(id);
    if (!view || (!caller.admin && !authority.engine.isRelevant(caller.clientId, id))) {
      return jsonErr("NotFound", `object ${id} does not exist`, 404);
    }
    const properties: Record<string, ReturnType<typeof encodeProperty>> = {};
    for (const [name, value] of view.properties) properties[name] = encodeProperty(value);
    return jsonOk({
      objectId: view.object.objectId,
      classId: view.object.classId,
      className: view.object.className,
      ownerId: view.object.ownerId ?? null,
      state: view.object.state,
      properties,
      relevancy: view.relevancy,
    });
  });

  // тело - wire JSON свойства как есть
  app.put(`${v1}/objects/:id/properties/:name`, requireAccess, async (c) => {
    const id = idParam(c, "id");
    if (id == null) return jsonErr("bad_request", "invalid object id", 400);
    const name = c.req.param("name") ?? "";
    const r = authority.setProperty(c.get("caller"), id, name, await c.req.text());
    return r.ok ? jsonOk(encodeProperty(r.data)) : fail(r.error);
  });

  app.delete(`${v1}/objects/:id`, requireAccess, (c) => {
    const id = idParam(c, "id");
    if (id == null) return jsonErr("bad_request", "invalid object id", 400);
    const r = authority.destroy(c.get("caller"), id);
    return r.ok ? jsonOk(null) : fail(r.error);
  });

  app.put(`${v1}/objects/:id/relevancy`, requireAccess, async (c) => {
    const id = idParam(c, "id");
    if (id == null) return jsonErr("bad_request", "invalid object id", 400);
    const body = RelevancySettingsSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const { maxDistance, ...rest } = body.data;
    const r = authority.setRelevancy(c.get("caller"), id, maxDistance != null ? { ...rest, maxDistance } : rest);
    return r.ok ? jsonOk(r.data) : fail(r.error);
  });

  app.get(`${v1}/relevant`, requireAccess, (c) => {
    const client = c.get("caller").clientId;
    const ids = authority.engine.filterRelevant(
      client,
      authority.liveObjects().map((o) => o.objectId)
    );
    return jsonOk({ tick: authority.engine.currentTick, objects: ids.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)) });
  });

  // ---------- зоны ----------

  app.get(`${v1}/zones`, requireAccess, () => jsonOk({ zones: authority.zones.allZones().map(zoneJson) }));

  app.post(`${v1}/zones`, requireAccess, async (c) => {
    const body = ZoneCreateSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const r = authority.zones.createZone(c.get("caller"), body.data.name, body.data.active);
    return r.ok ? jsonOk(zoneJson(r.data), 201) : fail(r.error);
  });

  app.patch(`${v1}/zones/:zoneId`, requireAccess, async (c) => {
    const zoneId = zoneParam(c);
    if (zoneId == null) return jsonErr("bad_request", "invalid zone id", 400);
    const body = ZonePatchSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const patch = {
      ...(body.data.name != null ? { name: body.data.name } : {}),
      ...(body.data.active != null ? { active: body.data.active } : {}),
    };
    const r = authority.zones.updateZone(c.get("caller"), zoneId, patch);
    return r.ok ? jsonOk(zoneJson(r.data)) : fail(r.error);
  });

  app.delete(`${v1}/zones/:zoneId`, requireAccess, (c) => {
    const zoneId = zoneParam(c);
    if (zoneId == null) return jsonErr("bad_request", "invalid zone id", 400);
    const r = authority.zones.deleteZone(c.get("caller"), zoneId);
    return r.ok ? jsonOk(null) : fail(r.error);
  });

  app.get(`${v1}/zones/:zoneId/members`, requireAccess, (c) => {
    const zoneId = zoneParam(c);
    if (zoneId == null) return jsonErr("bad_request", "invalid zone id", 400);
    if (!authority.zones.getZone(zoneId)) return jsonErr("NotFound", `zone ${zoneId} does not exist`, 404);
    const members = authority.zones.membersOf(zoneId).map((m) => ({ entity_id: m.entityId, is_client: m.isClient }));
    return jsonOk({ members });
  });

  // членством управляет владелец зоны или admin; клиент может вступить сам
  function mayEditMembers(caller: Caller, zoneId: number, entity: bigint) {
    const zone = authority.zones.getZone(zoneId);
    if (!zone) return true;
    return caller.admin || zone.ownerId === caller.clientId || entity === caller.clientId;
  }

  app.post(`${v1}/zones/:zoneId/members`, requireAccess, async (c) => {
    const zoneId = zoneParam(c);
    if (zoneId == null) return jsonErr("bad_request", "invalid zone id", 400);
    const body = ZoneMemberSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const entity = parseObjectId(body.data.entity_id);
    if (entity == null) return jsonErr("bad_request", "invalid entity_id", 400);
    if (!mayEditMembers(c.get("caller"), zoneId, entity)) {
      return jsonErr("PermissionDenied", `not allowed to change members of zone ${zoneId}`, 403);
    }
    const r = authority.zones.addToZone(entity, zoneId, body.data.is_client);
    return r.ok ? jsonOk(null, 201) : fail(r.error);
  });

  app.delete(`${v1}/zones/:zoneId/members/:entityId`, requireAccess, (c) => {
    const zoneId = zoneParam(c);
    const entity = idParam(c, "entityId");
    if (zoneId == null || entity == null) return jsonErr("bad_request", "invalid zone or entity id", 400);
    if (!mayEditMembers(c.get("caller"), zoneId, entity)) {
      return jsonErr("PermissionDenied", `not allowed to change members of zone ${zoneId}`, 403);
    }
    const r = authority.zones.removeFromZone(entity, zoneId);
    return r.ok ? jsonOk(null) : fail(r.error);
  });

  // ---------- admin ----------

  app.get(`${admin}/config`, requireAdmin, () => jsonOk(summarizeConfig(cfg)));

  app.post(`${admin}/classes`, requireAdmin, async (c) => {
    const body = ClassSpecSchema.safeParse(await readJson(c));
    if (!body.success) return invalid(body.error);
    const r = authority.classes.defineClass(body.data);
    if (!r.ok) return fail(r.error);
    log.info("class defined", { name: r.data.name, classId: r.data.classId });
    return jsonOk(r.data, 201);
  });

  app.delete(`${admin}/objects/:id`, requireAdmin, (c) => {
    const id = idParam(c, "id");
    if (id == null) return jsonErr("bad_request", "invalid object id", 400);
    const r = authority.forceDestroy(c.get("caller"), id);
    return r.ok ? jsonOk(null) : fail(r.error);
  });

  app.post(`${admin}/tick`, requireAdmin, () => {
    const report = scheduler.tick(clock());
    if (!report) return jsonErr("busy", "tick already running", 409);
    return jsonOk(report);
  });

  app.notFound(() => jsonErr("not_found", "Route not found", 404));
  app.onError((e) => {
    log.error("unhandled route error", { error: String(e) });
    return jsonErr("internal", "Internal error", 500);
  });

  return { app, runtime, outbox, auth };
}
