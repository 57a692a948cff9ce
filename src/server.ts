import fs from "fs";
import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import express from "express";
import pino from "pino";

import { loadConfig } from "./config.js";
import { makeErrorHandler, makeRoutes } from "./api/routes.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import { ResourceStore } from "./store/store.js";
import { HttpLanguageService } from "./llm/client.js";
import { createInterpreter } from "./plugin/createInterpreter.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(config.dataDir, { recursive: true });
const store: ResourceStore =
  config.store.driver === "sqlite"
    ? new SqliteStore(path.resolve(config.store.path))
    : new FileStore(path.resolve(config.dataDir));

const language = config.llm ? new HttpLanguageService(config.llm) : undefined;

async function main() {
  await store.init();

  const interpreter = createInterpreter({
    store,
    schema: config.schema,
    language,
    logger: log.child({ component: "interpreter" })
  });

  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.use(
    "/api",
    makeRoutes({ interpreter, sessionTokens: config.sessionTokens, rateLimit: config.rateLimit })
  );
  app.use(makeErrorHandler(log));

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DATA_DIR: config.dataDir,
        STORE_DRIVER: config.store.driver,
        IDENTIFIER_POLICY: config.schema.identifier,
        SESSIONS_CONFIGURED: Object.keys(config.sessionTokens).length,
        LLM_CONFIGURED: Boolean(language)
      },
      "Campus assets interpreter running"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, "store close failed");
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
