import { readFile } from "fs/promises";
import path from "path";
import { AckPolicySchema, EnvSchema, type Config } from "./schema";

export type EnvMap = Record<string, string | undefined>;

export const ENV_PREFIX = "MS_";

/**
Абсолютный путь к JSON-файлу с переопределениями конфигурации.
Берётся из MS_CONFIG_FILE, относительный путь считается от cwd. */
export function envGetConfigPath(env: EnvMap, cwd = process.cwd()): string | null {
  const p = (env.MS_CONFIG_FILE ?? "").trim();
  if (!p) return null;
  return path.isAbsolute(p) ? p : path.resolve(cwd, p);
}

export async function readConfigFile(fullPath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(fullPath, "utf8");
  } catch (e) {
    throw new Error(`cannot read MS_CONFIG_FILE: ${fullPath}: ${String(e)}`);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new Error(`invalid JSON in ${fullPath}: ${String(e)}`);
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

// объекты сливаются рекурсивно, массивы и скаляры заменяются
export function deepMerge(base: unknown, over: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(over)) return over === undefined ? base : over;
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(over)) out[k] = deepMerge(base[k], v);
  return out;
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return undefined;
}
export function parseIntSafe(v: string | undefined): number | undefined {
  if (v == null) return undefined;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
}
export function parseFloatSafe(v: string | undefined): number | undefined {
  if (v == null) return undefined;
  const n = Number.parseFloat(v);
  return Number.isFinite(n) ? n : undefined;
}

export function readEnvMap(): EnvMap {
  // плоская копия только нужных ключей (префикс MS_)
  const out: EnvMap = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (k.startsWith(ENV_PREFIX)) out[k] = v;
  }
  return out;
}

/**
Накладывает MS_* переменные на конфиг. Возвращает список проблем
(нераспознанные значения перечислений), пустой при успехе. */
export function applyEnvOverrides(base: Config, env: EnvMap): string[] {
  const get = (k: string) => env[k];
  const problems: string[] = [];

  const profile = get("MS_ENV");
  if (profile) {
    const p = EnvSchema.safeParse(profile.toLowerCase());
    if (p.success) base.env = p.data;
    else problems.push(`MS_ENV: unknown profile "${profile}"`);
  }

  // server
  base.server.host = get("MS_HOST") ?? base.server.host;
  base.server.port = parseIntSafe(get("MS_PORT")) ?? base.server.port;
  base.server.restPrefix = get("MS_REST_PREFIX") ?? base.server.restPrefix;
  base.server.adminPrefix = get("MS_ADMIN_PREFIX") ?? base.server.adminPrefix;
  const cors = get("MS_CORS");
  if (cors != null) {
    base.server.corsOrigins = cors
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }

  // replication
  base.replication.tickHz = parseIntSafe(get("MS_TICK_HZ")) ?? base.replication.tickHz;
  base.replication.tombstoneRetentionMs =
    parseIntSafe(get("MS_TOMBSTONE_RETENTION_MS")) ?? base.replication.tombstoneRetentionMs;
  base.replication.firstObjectId = parseIntSafe(get("MS_FIRST_OBJECT_ID")) ?? base.replication.firstObjectId;

  // relevancy
  base.relevancy.defaultMaxDistance =
    parseFloatSafe(get("MS_DEFAULT_MAX_DISTANCE")) ?? base.relevancy.defaultMaxDistance;
  base.relevancy.cellSize = parseFloatSafe(get("MS_CELL_SIZE")) ?? base.relevancy.cellSize;
  base.relevancy.unknownClientSeesAll =
    parseBool(get("MS_UNKNOWN_CLIENT_SEES_ALL")) ?? base.relevancy.unknownClientSeesAll;

  // prediction
  const ack = get("MS_ACK_POLICY");
  if (ack) {
    const p = AckPolicySchema.safeParse(ack);
    if (p.success) base.prediction.ackPolicy = p.data;
    else problems.push(`MS_ACK_POLICY: unknown policy "${ack}"`);
  }

  // logs
  base.logs.json = parseBool(get("MS_LOG_JSON")) ?? base.logs.json;
  base.logs.pretty = parseBool(get("MS_LOG_PRETTY")) ?? base.logs.pretty;
  const lvl = get("MS_LOG_LEVEL");
  if (lvl) {
    if (lvl === "debug" || lvl === "info" || lvl === "warn" || lvl === "error") base.logs.level = lvl;
    else problems.push(`MS_LOG_LEVEL: unknown level "${lvl}"`);
  }

  // auth
  base.auth.jwt.secret = get("MS_JWT_SECRET") ?? base.auth.jwt.secret;
  base.auth.jwt.issuer = get("MS_JWT_ISSUER") ?? base.auth.jwt.issuer;
  base.auth.jwt.accessTtl = get("MS_JWT_ACCESS_TTL") ?? base.auth.jwt.accessTtl;

  return problems;
}
