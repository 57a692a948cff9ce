import fs from "fs";
import path from "path";
import { nanoid } from "nanoid";
import { ResourceStore } from "./store.js";
import { aggregateResources, applyFields, applyFindOptions, matchesFilter } from "./filter.js";
import { DuplicateServiceTagError, StoreUnavailableError } from "../core/errors.js";
import {
  AggregateBucket,
  AggregateSpec,
  FindOptions,
  NewResource,
  Resource,
  ResourceFields,
  ResourceFilter,
  UpdateResult
} from "../types/contracts.js";

type LogLine =
  | { op: "put"; resource: Resource }
  | { op: "del"; id: string };

function sameTag(a: string | undefined, b: string | undefined) {
  return !!a && !!b && a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Append-only JSON-lines store. Every put/del is one line; the in-memory
 * index is rebuilt on init by replaying the log. Mutations run one at a time
 * through `queue`, so a multi-record update or delete is applied as a unit.
 */
export class FileStore implements ResourceStore {
  private dir: string;
  private logPath: string;
  private byId = new Map<string, Resource>();
  private queue: Promise<unknown> = Promise.resolve();
  private ready = false;

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.logPath = path.join(this.dir, "resources.jsonl");
  }

  async init(): Promise<void> {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      if (!fs.existsSync(this.logPath)) fs.writeFileSync(this.logPath, "", "utf8");
      this.replay();
      this.ready = true;
    } catch (err) {
      throw new StoreUnavailableError(`cannot open ${this.logPath}`, err);
    }
  }

  private replay() {
    this.byId.clear();
    const lines = fs.readFileSync(this.logPath, "utf8").split("\n").filter(Boolean);
    for (const line of lines) {
      let entry: LogLine;
      try {
        entry = JSON.parse(line);
      } catch {
        continue; // torn final line after a crash
      }
      if (entry.op === "put") this.byId.set(entry.resource.id, entry.resource);
      else this.byId.delete(entry.id);
    }
  }

  private append(entries: LogLine[]) {
    if (entries.length === 0) return;
    try {
      fs.appendFileSync(this.logPath, entries.map((e) => JSON.stringify(e)).join("\n") + "\n", "utf8");
    } catch (err) {
      throw new StoreUnavailableError(`cannot write ${this.logPath}`, err);
    }
  }

  private ensureReady() {
    if (!this.ready) throw new StoreUnavailableError("file store is not initialised");
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const next = this.queue.then(fn);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private tagTaken(tag: string | undefined, exceptIds: Set<string>) {
    for (const r of this.byId.values()) {
      if (!exceptIds.has(r.id) && sameTag(r.service_tag, tag)) return true;
    }
    return false;
  }

  async find(filter: ResourceFilter, opts?: FindOptions): Promise<Resource[]> {
    this.ensureReady();
    const rows = [...this.byId.values()].filter((r) => matchesFilter(r, filter));
    return applyFindOptions(rows, opts);
  }

  insert(input: NewResource): Promise<Resource> {
    return this.exclusive(() => {
      this.ensureReady();
      if (input.service_tag && this.tagTaken(input.service_tag, new Set())) {
        throw new DuplicateServiceTagError(input.service_tag);
      }
      const now = new Date().toISOString();
      const resource: Resource = { ...input, id: nanoid(), created_at: now, updated_at: now };
      this.append([{ op: "put", resource }]);
      this.byId.set(resource.id, resource);
      return resource;
    });
  }

  updateMany(filter: ResourceFilter, fields: ResourceFields): Promise<UpdateResult> {
    return this.exclusive(() => {
      this.ensureReady();
      const matched = [...this.byId.values()].filter((r) => matchesFilter(r, filter));
      if (matched.length === 0) return { matched: 0, modified: 0 };
      if (fields.service_tag !== undefined) {
        // one tag cannot be spread over several records
        const ids = new Set(matched.map((r) => r.id));
        if (matched.length > 1 || this.tagTaken(fields.service_tag, ids)) {
          throw new DuplicateServiceTagError(fields.service_tag);
        }
      }

      const now = new Date().toISOString();
      const updated = matched
        .map((r) => applyFields(r, fields, now))
        .filter((r): r is Resource => r !== null);

      this.append(updated.map((resource) => ({ op: "put" as const, resource })));
      for (const r of updated) this.byId.set(r.id, r);
      return { matched: matched.length, modified: updated.length };
    });
  }

  deleteMany(filter: ResourceFilter): Promise<number> {
    return this.exclusive(() => {
      this.ensureReady();
      const doomed = [...this.byId.values()].filter((r) => matchesFilter(r, filter));
      this.append(doomed.map((r) => ({ op: "del" as const, id: r.id })));
      for (const r of doomed) this.byId.delete(r.id);
      return doomed.length;
    });
  }

  async aggregate(agg: AggregateSpec): Promise<AggregateBucket[]> {
    this.ensureReady();
    return aggregateResources([...this.byId.values()], agg);
  }

  async close(): Promise<void> {
    await this.queue;
    this.ready = false;
  }
}
