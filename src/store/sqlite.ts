import sqlite3 from "sqlite3";
import { nanoid } from "nanoid";
import { ResourceStore } from "./store.js";
import { applyFields } from "./filter.js";
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

type Param = string | number | null;

type ResourceRow = {
  id: string;
  description: string;
  service_tag: string | null;
  identification_number: string | null;
  procurement_date: string;
  cost: number;
  location: string;
  department: string;
  created_by: string;
  created_at: string;
  updated_at: string;
};

type BucketRow = { key: string | null; count: number; value: number | null };

function isConstraint(err: Error) {
  return "code" in err && err.code === "SQLITE_CONSTRAINT";
}

function failed(err: Error, sql: string) {
  if (isConstraint(err)) return err;
  return new StoreUnavailableError(`sqlite: ${err.message} (${sql.trim().split(/\s+/)[0]})`, err);
}

function run(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(failed(err, sql));
      else resolve(this.changes);
    });
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all<T>(sql, params, (err, rows) => (err ? reject(failed(err, sql)) : resolve(rows)));
  });
}

const KEYED = ["description", "service_tag", "identification_number", "location", "department"] as const;

// sqlite's lower() folds ASCII only; match on keys folded the way filter.ts folds
function fold(v: string | undefined): string | null {
  return v === undefined ? null : v.trim().toLowerCase();
}

function keysOf(r: Resource): Param[] {
  return KEYED.map((col) => fold(r[col]));
}

function whereOf(filter: ResourceFilter): { sql: string; params: Param[] } {
  const where: string[] = [];
  const params: Param[] = [];

  for (const col of ["service_tag", "identification_number", "location", "department"] as const) {
    const v = filter[col];
    if (v !== undefined) { where.push(`${col}_key = ?`); params.push(fold(v)); }
  }
  if (filter.description !== undefined) {
    where.push(`instr(description_key, ?) > 0`);
    params.push(fold(filter.description));
  }

  const c = filter.cost;
  if (c) {
    if (c.op === "between") { where.push(`cost between ? and ?`); params.push(c.min, c.max); }
    else {
      const sym = { eq: "=", gt: ">", gte: ">=", lt: "<", lte: "<=" }[c.op];
      where.push(`cost ${sym} ?`);
      params.push(c.value);
    }
  }

  const d = filter.procurement_date;
  if (d?.from) { where.push(`procurement_date >= ?`); params.push(d.from); }
  if (d?.to) { where.push(`procurement_date <= ?`); params.push(d.to); }

  return { sql: where.length ? `where ${where.join(" and ")}` : "", params };
}

function rowToResource(r: ResourceRow): Resource {
  return {
    id: r.id,
    description: r.description,
    ...(r.service_tag !== null ? { service_tag: r.service_tag } : {}),
    ...(r.identification_number !== null ? { identification_number: r.identification_number } : {}),
    procurement_date: r.procurement_date,
    cost: r.cost,
    location: r.location,
    department: r.department,
    created_by: r.created_by,
    created_at: r.created_at,
    updated_at: r.updated_at
  };
}

export class SqliteStore implements ResourceStore {
  private db: sqlite3.Database;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists resources (
        id text primary key,
        description text not null,
        service_tag text,
        identification_number text,
        procurement_date text not null,
        cost real not null check (cost >= 0),
        location text not null,
        department text not null,
        created_by text not null,
        created_at text not null,
        updated_at text not null,
        description_key text not null,
        service_tag_key text,
        identification_number_key text,
        location_key text not null,
        department_key text not null
      );
    `);
    await run(this.db, `create unique index if not exists ux_resources_service_tag on resources(service_tag_key) where service_tag_key is not null;`);
    await run(this.db, `create index if not exists idx_resources_department on resources(department_key);`);
    await run(this.db, `create index if not exists idx_resources_location on resources(location_key);`);
  }

  // sqlite3 shares one connection; transactions must not interleave
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async inTransaction<T>(fn: () => Promise<T>): Promise<T> {
    await run(this.db, `begin immediate;`);
    try {
      const out = await fn();
      await run(this.db, `commit;`);
      return out;
    } catch (err) {
      await run(this.db, `rollback;`);
      throw err;
    }
  }

  // reads queue behind writes so an open transaction is never seen half-applied
  find(filter: ResourceFilter, opts: FindOptions = {}): Promise<Resource[]> {
    return this.exclusive(async () => {
      const w = whereOf(filter);
      const params = [...w.params];
      let sql = `select * from resources ${w.sql}`;
      if (opts.sort) sql += ` order by ${opts.sort.field} ${opts.sort.direction}, id asc`;
      if (opts.limit !== undefined) { sql += ` limit ?`; params.push(Math.max(0, opts.limit)); }
      const rows = await all<ResourceRow>(this.db, sql, params);
      return rows.map(rowToResource);
    });
  }

  insert(input: NewResource): Promise<Resource> {
    return this.exclusive(async () => {
      const now = new Date().toISOString();
      const resource: Resource = { ...input, id: nanoid(), created_at: now, updated_at: now };
      try {
        await run(this.db, `
          insert into resources (
            id, description, service_tag, identification_number, procurement_date,
            cost, location, department, created_by, created_at, updated_at,
            description_key, service_tag_key, identification_number_key, location_key, department_key
          ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?)
        `, [
          resource.id, resource.description, resource.service_tag ?? null, resource.identification_number ?? null,
          resource.procurement_date, resource.cost, resource.location, resource.department,
          resource.created_by, resource.created_at, resource.updated_at,
          ...keysOf(resource)
        ]);
      } catch (err) {
        if (err instanceof Error && isConstraint(err) && resource.service_tag) {
          throw new DuplicateServiceTagError(resource.service_tag);
        }
        throw err;
      }
      return resource;
    });
  }

  updateMany(filter: ResourceFilter, fields: ResourceFields): Promise<UpdateResult> {
    return this.exclusive(() => this.inTransaction(async () => {
      const w = whereOf(filter);
      const rows = (await all<ResourceRow>(this.db, `select * from resources ${w.sql}`, w.params)).map(rowToResource);
      if (rows.length === 0) return { matched: 0, modified: 0 };
      if (fields.service_tag !== undefined && rows.length > 1) throw new DuplicateServiceTagError(fields.service_tag);

      const now = new Date().toISOString();
      let modified = 0;
      for (const r of rows) {
        const next = applyFields(r, fields, now);
        if (!next) continue;
        try {
          await run(this.db, `
            update resources set description=?, service_tag=?, identification_number=?, procurement_date=?,
              cost=?, location=?, department=?, updated_at=?,
              description_key=?, service_tag_key=?, identification_number_key=?, location_key=?, department_key=?
            where id=?
          `, [
            next.description, next.service_tag ?? null, next.identification_number ?? null, next.procurement_date,
            next.cost, next.location, next.department, next.updated_at,
            ...keysOf(next), next.id
          ]);
        } catch (err) {
          if (err instanceof Error && isConstraint(err) && next.service_tag) {
            throw new DuplicateServiceTagError(next.service_tag);
          }
          throw err;
        }
        modified++;
      }
      return { matched: rows.length, modified };
    }));
  }

  deleteMany(filter: ResourceFilter): Promise<number> {
    return this.exclusive(() => this.inTransaction(() => {
      const w = whereOf(filter);
      return run(this.db, `delete from resources ${w.sql}`, w.params);
    }));
  }

  aggregate(agg: AggregateSpec): Promise<AggregateBucket[]> {
    return this.exclusive(() => this.aggregateNow(agg));
  }

  private async aggregateNow(agg: AggregateSpec): Promise<AggregateBucket[]> {
    const w = whereOf(agg.filter);
    const expr = agg.op === "count" ? "count(*)" : agg.op === "sum" ? "coalesce(sum(cost), 0)" : `${agg.op}(cost)`;

    if (!agg.groupBy) {
      const rows = await all<BucketRow>(this.db, `select null as key, count(*) as count, ${expr} as value from resources ${w.sql}`, w.params);
      return rows.map((r) => ({ key: null, count: r.count, value: r.value }));
    }

    const key = `coalesce(nullif(${agg.groupBy}, ''), 'Unknown')`;
    const rows = await all<BucketRow>(this.db, `
      select ${key} as key, count(*) as count, ${expr} as value
      from resources ${w.sql}
      group by ${key}
    `, w.params);
    return rows
      .map((r) => ({ key: r.key ?? "Unknown", count: r.count, value: r.value }))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(failed(err, "close")) : resolve()));
    });
  }
}
