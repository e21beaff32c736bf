import { ConfigSchema, type Config, EnvSchema } from "./schema";
import { DEV_JWT_SECRET, makeDefaults } from "./defaults";
import { applyEnvOverrides, deepMerge, envGetConfigPath, readConfigFile, readEnvMap, type EnvMap } from "./env";

export interface LoadOptions {
  envMap?: EnvMap;
  profile?: "dev" | "prod" | "test";
  cwd?: string;
}

function resolveEnvProfile(env: EnvMap, opt?: LoadOptions): Config["env"] {
  const raw = (opt?.profile ?? env.MS_ENV ?? "dev").toLowerCase();
  const parsed = EnvSchema.safeParse(raw);
  return parsed.success ? parsed.data : "dev";
}

function issuesOf(error: { issues: ReadonlyArray<{ path: (string | number)[]; message: string }> }) {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

export async function loadConfig(opt?: LoadOptions): Promise<Config> {
  const env = opt?.envMap ?? readEnvMap();
  const profile = resolveEnvProfile(env, opt);
  let work = makeDefaults(profile);

  const file = envGetConfigPath(env, opt?.cwd);
  if (file) {
    const merged = ConfigSchema.safeParse(deepMerge(work, await readConfigFile(file)));
    if (!merged.success) throw new Error(`Config validation error (${file}): ${issuesOf(merged.error)}`);
    work = merged.data;
  }

  const problems = applyEnvOverrides(work, env);
  // профиль из opt сильнее MS_ENV
  if (opt?.profile) work.env = opt.profile;

  const parsed = ConfigSchema.safeParse(work);
  if (!parsed.success) problems.push(issuesOf(parsed.error));
  if (problems.length || !parsed.success) {
    throw new Error(`Config validation error: ${problems.join("; ")}`);
  }
  const cfg = parsed.data;

  if (cfg.env === "prod" && cfg.auth.jwt.secret === DEV_JWT_SECRET) {
    throw new Error(`MS_JWT_SECRET is required in prod (default ${DEV_JWT_SECRET} is not allowed)`);
  }
  return cfg;
}

export function summarizeConfig(cfg: Config) {
  return {
    env: cfg.env,
    server: cfg.server,
    replication: cfg.replication,
    relevancy: cfg.relevancy,
    prediction: cfg.prediction,
    logs: cfg.logs,
    auth: { jwt: { algorithm: cfg.auth.jwt.algorithm, issuer: cfg.auth.jwt.issuer, secret: "***" } },
  };
}
