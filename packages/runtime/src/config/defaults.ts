import { type Config } from "./schema";

export const DEV_JWT_SECRET = "dev-secret";

export function makeDefaults(env: Config["env"]): Config {
  const isDev = env === "dev";

  return {
    env,
    server: {
      host: "0.0.0.0",
      port: 8080,
      restPrefix: "/api",
      adminPrefix: "/admin",
      corsOrigins: ["*"],
    },
    replication: {
      tickHz: 20,
      tombstoneRetentionMs: 5_000,
      firstObjectId: 1000,
      firstClassId: 100,
    },
    relevancy: {
      defaultMaxDistance: 10_000,
      cellSize: 500,
      unknownClientSeesAll: true,
      missingSettings: { level: "AlwaysRelevant", frequency: "High", priority: "Normal" },
    },
    prediction: { ackPolicy: "AcceptAny" },
    logs: { json: !isDev, pretty: false, level: isDev ? "debug" : env === "test" ? "warn" : "info" },
    auth: {
      jwt: {
        algorithm: "HS256",
        secret: DEV_JWT_SECRET,
        issuer: "mirrorsync",
        accessTtl: "15m",
      },
    },
  };
}
