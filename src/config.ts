import { z } from "zod";
import { SessionTokensSchema } from "./api/caller.js";

const tokensJson = z
  .string()
  .default("{}")
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw.trim() || "{}");
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "SESSION_TOKENS_JSON is not valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(SessionTokensSchema);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_DIR: z.string().min(1).default("./data"),
  STORE_DRIVER: z.enum(["file", "sqlite"]).default("file"),
  SQLITE_PATH: z.string().min(1).optional(),
  IDENTIFIER_POLICY: z.enum(["either", "optional"]).default("either"),
  SESSION_TOKENS_JSON: tokensJson,
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  LLM_MODEL: z.string().min(1).default("llama-3.1-8b-instant"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60)
});

export type Config = ReturnType<typeof loadConfig>;

/** Validates the environment. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const e = EnvSchema.parse(present);
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dataDir: e.DATA_DIR,
    store:
      e.STORE_DRIVER === "sqlite"
        ? { driver: "sqlite" as const, path: e.SQLITE_PATH ?? `${e.DATA_DIR}/inventory.sqlite` }
        : { driver: "file" as const },
    schema: { identifier: e.IDENTIFIER_POLICY },
    sessionTokens: e.SESSION_TOKENS_JSON,
    llm: e.LLM_API_KEY
      ? { apiKey: e.LLM_API_KEY, baseUrl: e.LLM_BASE_URL, model: e.LLM_MODEL, timeoutMs: e.LLM_TIMEOUT_MS }
      : undefined,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX }
  };
}
