import { jwtVerify, SignJWT } from "jose";
import { parseObjectId, type Caller } from "@mirrorsync/core";
import type { Config } from "@mirrorsync/runtime";

export type Role = "user" | "admin";

export interface AccessClaims {
  sub: string;
  role: Role;
}

export function bearerToken(req: Request): string | null {
  const a = req.headers.get("authorization");
  if (a && a.toLowerCase().startsWith("bearer ")) return a.slice(7).trim();
  return null;
}

// "15m" -> 900; нераспознанное -> 0
export function parseTTL(ttl: string): number {
  const m = ttl.match(/^(\d+)(ms|s|m|h|d)$/);
  if (!m) return 0;
  const val = Number(m[1]);
  switch (m[2]) {
    case "ms":
      return Math.floor(val / 1000);
    case "s":
      return val;
    case "m":
      return val * 60;
    case "h":
      return val * 3600;
    case "d":
      return val * 86400;
    default:
      return 0;
  }
}

export interface Auth {
  accessTtl: number;
  sign(claims: AccessClaims, ttlSec?: number): Promise<string>;
  verify(token: string | null): Promise<Caller | null>;
}

// sub токена - десятичный ClientId
export function createAuth(jwt: Config["auth"]["jwt"], nowMs: () => number = () => Date.now()): Auth {
  const key = new TextEncoder().encode(jwt.secret);
  const accessTtl = parseTTL(jwt.accessTtl) || 15 * 60;

  async function sign(claims: AccessClaims, ttlSec = accessTtl) {
    const now = Math.floor(nowMs() / 1000);
    return new SignJWT({ role: claims.role, typ: "access" })
      .setProtectedHeader({ alg: jwt.algorithm, typ: "JWT" })
      .setSubject(claims.sub)
      .setIssuedAt(now)
      .setExpirationTime(now + ttlSec)
      .setIssuer(jwt.issuer)
      .sign(key);
  }

  async function verify(token: string | null): Promise<Caller | null> {
    if (!token) return null;
    try {
      const { payload } = await jwtVerify(token, key, {
        algorithms: [jwt.algorithm],
        issuer: jwt.issuer,
        currentDate: new Date(nowMs()),
      });
      if (payload.typ !== "access" || typeof payload.sub !== "string") return null;
      const clientId = parseObjectId(payload.sub);
      if (clientId == null) return null;
      return { clientId, admin: payload.role === "admin" };
    } catch {
      return null;
    }
  }

  return { accessTtl, sign, verify };
}
