import crypto from "node:crypto";
import { z } from "zod";
import { Caller } from "../types/contracts.js";

export const CallerSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(["admin", "manager", "viewer"])
});

/** SESSION_TOKENS_JSON: {"<token>": {"userId": "...", "role": "admin|manager|viewer"}} */
export const SessionTokensSchema = z.record(z.string().min(1), CallerSchema);

export type SessionTokens = z.infer<typeof SessionTokensSchema>;

function constantTimeEq(a: string, b: string) {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  if (ab.length !== bb.length) return false;
  return crypto.timingSafeEqual(ab, bb);
}

function bearerOf(authorization: string | undefined): string {
  const m = (authorization || "").trim().match(/^Bearer\s+(.+)$/i);
  return m ? m[1].trim() : "";
}

/** Resolves `Authorization: Bearer <token>` against the configured sessions. */
export function requireCaller(authorization: string | undefined, tokens: SessionTokens) {
  const token = bearerOf(authorization);
  if (!token) return { ok: false as const, status: 401, error: "missing_token" as const };

  for (const [known, caller] of Object.entries(tokens)) {
    if (constantTimeEq(known, token)) {
      const found: Caller = { userId: caller.userId, role: caller.role };
      return { ok: true as const, status: 200, caller: found };
    }
  }
  return { ok: false as const, status: 401, error: "invalid_token" as const };
}
