import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

const dbPath = path.resolve(config.store.driver === "sqlite" ? config.store.path : path.join(config.dataDir, "inventory.sqlite"));
fs.mkdirSync(path.dirname(dbPath), { recursive: true });
const store = new SqliteStore(dbPath);

store
  .init()
  .then(() => store.close())
  .then(() => log.info({ dbPath }, "db initialized"))
  .catch((err: unknown) => {
    log.error({ err, dbPath }, "db init failed");
    process.exit(1);
  });
