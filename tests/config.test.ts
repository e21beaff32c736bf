import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { applyEnvOverrides, deepMerge, loadConfig, makeDefaults, summarizeConfig } from "@mirrorsync/runtime";

test("config defaults (test profile)", async () => {
  const cfg = await loadConfig({ profile: "test", envMap: {} });
  expect(cfg.env).toBe("test");
  expect(cfg.server.port).toBe(8080);
  expect(cfg.replication.tickHz).toBe(20);
  expect(cfg.replication.firstObjectId).toBe(1000);
  expect(cfg.relevancy.unknownClientSeesAll).toBe(true);
  expect(cfg.relevancy.missingSettings).toEqual({ level: "AlwaysRelevant", frequency: "High", priority: "Normal" });
  expect(cfg.prediction.ackPolicy).toBe("AcceptAny");
  expect(cfg.logs.level).toBe("warn");
});

test("config env overrides", async () => {
  const cfg = await loadConfig({
    profile: "dev",
    envMap: {
      MS_PORT: "9090",
      MS_LOG_LEVEL: "error",
      MS_CORS: "https://example.com, https://cdn.example.com",
      MS_TICK_HZ: "60",
      MS_ACK_POLICY: "MonotonicOnly",
      MS_UNKNOWN_CLIENT_SEES_ALL: "off",
      MS_DEFAULT_MAX_DISTANCE: "250.5",
    },
  });
  expect(cfg.server.port).toBe(9090);
  expect(cfg.logs.level).toBe("error");
  expect(cfg.server.corsOrigins).toEqual(["https://example.com", "https://cdn.example.com"]);
  expect(cfg.replication.tickHz).toBe(60);
  expect(cfg.prediction.ackPolicy).toBe("MonotonicOnly");
  expect(cfg.relevancy.unknownClientSeesAll).toBe(false);
  expect(cfg.relevancy.defaultMaxDistance).toBe(250.5);
});

test("unknown enum values in env are reported", async () => {
  await expect(loadConfig({ profile: "dev", envMap: { MS_ACK_POLICY: "Sometimes" } })).rejects.toThrow(
    'Config validation error: MS_ACK_POLICY: unknown policy "Sometimes"'
  );
});

test("schema violations fail the load", async () => {
  await expect(loadConfig({ profile: "dev", envMap: { MS_FIRST_OBJECT_ID: "5" } })).rejects.toThrow(
    /replication\.firstObjectId/
  );
});

test("prod refuses the default jwt secret", async () => {
  await expect(loadConfig({ profile: "prod", envMap: {} })).rejects.toThrow(
    "MS_JWT_SECRET is required in prod (default dev-secret is not allowed)"
  );
  const cfg = await loadConfig({ profile: "prod", envMap: { MS_JWT_SECRET: "test-secret" } });
  expect(cfg.auth.jwt.secret).toBe("test-secret");
  expect(cfg.logs.json).toBe(true);
});

test("explicit profile wins over MS_ENV", async () => {
  const cfg = await loadConfig({ profile: "test", envMap: { MS_ENV: "dev" } });
  expect(cfg.env).toBe("test");
});

test("config file is merged under env overrides", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "mirrorsync-cfg-"));
  await writeFile(
    path.join(dir, "cfg.json"),
    JSON.stringify({ server: { port: 7000 }, relevancy: { cellSize: 128 } }),
    "utf8"
  );
  const cfg = await loadConfig({
    profile: "test",
    cwd: dir,
    envMap: { MS_CONFIG_FILE: "cfg.json", MS_PORT: "7001" },
  });
  expect(cfg.relevancy.cellSize).toBe(128);
  expect(cfg.server.port).toBe(7001);
  expect(cfg.server.host).toBe("0.0.0.0");
});

test("missing config file is an error", async () => {
  await expect(
    loadConfig({ profile: "test", cwd: tmpdir(), envMap: { MS_CONFIG_FILE: "does-not-exist-42.json" } })
  ).rejects.toThrow(/cannot read MS_CONFIG_FILE/);
});

test("deepMerge replaces arrays and merges objects", () => {
  expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: 1 });
});

test("applyEnvOverrides leaves unknown keys alone", () => {
  const cfg = makeDefaults("dev");
  expect(applyEnvOverrides(cfg, { MS_PORT: "not-a-number", OTHER: "x" })).toEqual([]);
  expect(cfg.server.port).toBe(8080);
});

test("summary hides the secret", () => {
  const s = summarizeConfig(makeDefaults("dev"));
  expect(s.auth.jwt.secret).toBe("***");
  expect(s.auth.jwt.issuer).toBe("mirrorsync");
});
