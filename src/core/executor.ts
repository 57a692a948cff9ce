import type { Logger } from "pino";
import { ResourceStore } from "../store/store.js";
import { isEmptyFilter } from "../store/filter.js";
import { computeInventoryStats, InventoryStats } from "./stats.js";
import { isInterpreterError, StoreUnavailableError, UnauthorizedError } from "./errors.js";
import {
  AggregateBucket,
  Caller,
  DraftOperation,
  GroupField,
  NewResource,
  QueryPlan,
  Resource,
  ResourceFields,
  ResourceFilter,
  Role
} from "../types/contracts.js";

const WRITERS: Role[] = ["admin", "manager"];

export function canWrite(role: Role): boolean {
  return WRITERS.includes(role);
}

export type QueryAnswer =
  | { kind: "aggregate"; op: "count" | "sum" | "avg"; groupBy?: GroupField; buckets: AggregateBucket[] }
  | { kind: "rank"; groupBy: GroupField; by: "count" | "sum"; direction: "asc" | "desc"; buckets: AggregateBucket[] }
  | { kind: "resources"; order?: "asc" | "desc"; rows: Resource[]; total: number }
  | { kind: "summary"; stats: InventoryStats }
  | { kind: "chat"; stats: InventoryStats };

export type ExecutionResult =
  | { kind: "created"; resource: Resource }
  | { kind: "updated"; filter: ResourceFilter; fields: ResourceFields; matched: number; modified: number }
  | { kind: "deleted"; filter: ResourceFilter; deleted: number }
  | { kind: "confirmation_required"; intent: "update" | "delete"; fields: ResourceFields; matched: number }
  | { kind: "answer"; filter: ResourceFilter; answer: QueryAnswer };

export type ExecuteOptions = { confirmed?: boolean };

export function createExecutor(args: { store: ResourceStore; logger: Logger; now?: () => Date }) {
  const { store } = args;
  const log = args.logger;
  const now = args.now ?? (() => new Date());

  async function guarded<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isInterpreterError(err)) throw err;
      log.error({ err, what }, "store call failed");
      throw new StoreUnavailableError(`store call ${what} failed`, err);
    }
  }

  async function answer(plan: QueryPlan, filter: ResourceFilter): Promise<QueryAnswer> {
    switch (plan.kind) {
      case "count":
      case "sum":
      case "avg": {
        const { kind: op, groupBy } = plan;
        const buckets = await guarded("aggregate", () => store.aggregate({ op, filter, groupBy }));
        return { kind: "aggregate", op, groupBy, buckets };
      }
      case "rank": {
        const { by, groupBy, direction } = plan;
        const buckets = await guarded("aggregate", () => store.aggregate({ op: by, filter, groupBy }));
        const sign = direction === "desc" ? -1 : 1;
        const ranked = [...buckets].sort((a, b) => sign * ((a.value ?? 0) - (b.value ?? 0)));
        return { kind: "rank", groupBy, by, direction, buckets: ranked };
      }
      case "extreme": {
        const { direction, limit } = plan;
        const rows = await guarded("find", () => store.find(filter, { sort: { field: "cost", direction }, limit }));
        const total = await guarded("aggregate", () => store.aggregate({ op: "count", filter }));
        return { kind: "resources", order: direction, rows, total: total[0]?.count ?? rows.length };
      }
      case "list": {
        const all = await guarded("find", () => store.find(filter, { sort: { field: "updated_at", direction: "desc" } }));
        return { kind: "resources", rows: all.slice(0, plan.limit), total: all.length };
      }
      case "summary": {
        const rows = await guarded("find", () => store.find(filter));
        return { kind: "summary", stats: computeInventoryStats(rows, now()) };
      }
      case "chat": {
        const rows = await guarded("find", () => store.find(filter));
        return { kind: "chat", stats: computeInventoryStats(rows, now()) };
      }
    }
  }

  /**
   * Runs a validated draft. Writes need a writer role; an update or delete
   * with an empty filter only runs when the caller confirmed it.
   */
  async function execute(draft: DraftOperation, caller: Caller, opts: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (draft.intent !== "query" && !canWrite(caller.role)) {
      log.warn({ userId: caller.userId, role: caller.role, intent: draft.intent }, "write rejected");
      throw new UnauthorizedError(caller.role);
    }

    switch (draft.intent) {
      case "create": {
        const { description, cost, location, department, procurement_date } = draft.fields;
        if (
          description === undefined || cost === undefined || location === undefined ||
          department === undefined || procurement_date === undefined
        ) {
          throw new Error("create draft was not validated");
        }
        const input: NewResource = {
          ...draft.fields,
          description,
          cost,
          location,
          department,
          procurement_date,
          created_by: caller.userId
        };
        const resource = await guarded("insert", () => store.insert(input));
        log.info({ resourceId: resource.id, userId: caller.userId }, "resource: created");
        return { kind: "created", resource };
      }

      case "update":
      case "delete": {
        if (isEmptyFilter(draft.filter) && !opts.confirmed) {
          const total = await guarded("aggregate", () => store.aggregate({ op: "count", filter: {} }));
          log.info({ intent: draft.intent, matched: total[0]?.count ?? 0 }, "unscoped write held for confirmation");
          return { kind: "confirmation_required", intent: draft.intent, fields: draft.fields, matched: total[0]?.count ?? 0 };
        }
        if (draft.intent === "update") {
          const res = await guarded("updateMany", () => store.updateMany(draft.filter, draft.fields));
          log.info({ filter: draft.filter, ...res }, "resources: updated");
          return { kind: "updated", filter: draft.filter, fields: draft.fields, ...res };
        }
        const deleted = await guarded("deleteMany", () => store.deleteMany(draft.filter));
        log.info({ filter: draft.filter, deleted }, "resources: deleted");
        return { kind: "deleted", filter: draft.filter, deleted };
      }

      case "query":
        return { kind: "answer", filter: draft.filter, answer: await answer(draft.query ?? { kind: "chat" }, draft.filter) };
    }
  }

  return { execute };
}

export type Executor = ReturnType<typeof createExecutor>;
