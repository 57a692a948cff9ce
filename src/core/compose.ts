import { AggregateBucket, CostMatcher, DateRange, Resource, ResourceFields, ResourceFilter } from "../types/contracts.js";
import { ExecutionResult, QueryAnswer } from "./executor.js";
import { InterpreterError } from "./errors.js";
import { IDENTIFIER_FIELD, UPDATE_FIELDS_FIELD, ValidationResult } from "./validate.js";
import { InventoryStats, RECENT_DAYS } from "./stats.js";
import { formatAmount } from "./values.js";

export type Outcome =
  | Extract<ValidationResult, { kind: "incomplete" | "invalid" }>
  | ExecutionResult
  | { kind: "failure"; error: InterpreterError };

const FIELD_LABELS: Record<string, string> = {
  description: "description",
  [IDENTIFIER_FIELD]: "service tag or identification number",
  service_tag: "service tag",
  identification_number: "identification number",
  cost: "cost",
  location: "location",
  department: "department",
  procurement_date: "procurement date",
  [UPDATE_FIELDS_FIELD]: "which field to change and its new value"
};

function label(field: string) {
  return FIELD_LABELS[field] ?? field.replace(/_/g, " ");
}

export function joinList(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

function plural(n: number, one: string, many = `${one}s`) {
  return `${n} ${n === 1 ? one : many}`;
}

function describeCost(m: CostMatcher): string {
  switch (m.op) {
    case "eq": return `costing exactly ${formatAmount(m.value)}`;
    case "gt": return `costing more than ${formatAmount(m.value)}`;
    case "gte": return `costing at least ${formatAmount(m.value)}`;
    case "lt": return `costing less than ${formatAmount(m.value)}`;
    case "lte": return `costing at most ${formatAmount(m.value)}`;
    case "between": return `costing between ${formatAmount(m.min)} and ${formatAmount(m.max)}`;
  }
}

function describeDates(d: DateRange): string {
  if (d.from && d.to) return d.from === d.to ? `procured on ${d.from}` : `procured between ${d.from} and ${d.to}`;
  if (d.from) return `procured on or after ${d.from}`;
  return `procured on or before ${d.to}`;
}

export function describeFilter(filter: ResourceFilter): string {
  const parts: string[] = [];
  if (filter.description) parts.push(`matching "${filter.description}"`);
  if (filter.department) parts.push(`in the ${filter.department} department`);
  if (filter.location) parts.push(`at ${filter.location}`);
  if (filter.service_tag) parts.push(`with service tag ${filter.service_tag}`);
  if (filter.identification_number) parts.push(`with identification number ${filter.identification_number}`);
  if (filter.cost) parts.push(describeCost(filter.cost));
  if (filter.procurement_date) parts.push(describeDates(filter.procurement_date));
  return parts.length ? parts.join(" ") : "across the whole inventory";
}

function describeFields(fields: ResourceFields): string {
  const parts: string[] = [];
  if (fields.description !== undefined) parts.push(`description to "${fields.description}"`);
  if (fields.service_tag !== undefined) parts.push(`service tag to ${fields.service_tag}`);
  if (fields.identification_number !== undefined) parts.push(`identification number to ${fields.identification_number}`);
  if (fields.cost !== undefined) parts.push(`cost to ${formatAmount(fields.cost)}`);
  if (fields.location !== undefined) parts.push(`location to ${fields.location}`);
  if (fields.department !== undefined) parts.push(`department to ${fields.department}`);
  if (fields.procurement_date !== undefined) parts.push(`procurement date to ${fields.procurement_date}`);
  return joinList(parts);
}

function describeResource(r: Resource): string {
  const ids = [
    r.service_tag ? `service tag ${r.service_tag}` : "",
    r.identification_number ? `identification number ${r.identification_number}` : ""
  ].filter(Boolean);
  const idText = ids.length ? ` (${joinList(ids)})` : "";
  return `"${r.description}"${idText} in the ${r.department} department at ${r.location}, costing ${formatAmount(r.cost)}`;
}

function composeCreated(r: Resource): string {
  const ids = [
    r.service_tag ? `service tag ${r.service_tag}` : "",
    r.identification_number ? `identification number ${r.identification_number}` : ""
  ].filter(Boolean);
  return (
    `Created "${r.description}" in the ${r.department} department at ${r.location}, ` +
    `costing ${formatAmount(r.cost)} and procured on ${r.procurement_date}` +
    (ids.length ? `, with ${joinList(ids)}` : "") +
    `. Its resource id is ${r.id}.`
  );
}

function composeAggregate(a: Extract<QueryAnswer, { kind: "aggregate" }>, scope: string): string {
  if (a.groupBy) {
    if (a.buckets.length === 0) return `There are no resources ${scope}.`;
    const what = a.op === "count" ? "Resource count" : a.op === "sum" ? "Total value" : "Average cost";
    const lines = a.buckets.map((b) => {
      if (a.op === "count") return `${b.key} has ${b.count}`;
      return `${b.key} ${a.op === "sum" ? "holds" : "averages"} ${formatAmount(b.value ?? 0)} over ${plural(b.count, "resource")}`;
    });
    return `${what} by ${a.groupBy} ${scope}: ${joinList(lines)}.`;
  }

  const b: AggregateBucket = a.buckets[0] ?? { key: null, count: 0, value: a.op === "avg" ? null : 0 };
  if (a.op === "count") {
    if (b.count === 0) return `There are no resources ${scope}.`;
    return b.count === 1 ? `There is 1 resource ${scope}.` : `There are ${b.count} resources ${scope}.`;
  }
  if (b.count === 0 || b.value === null) return `There are no resources ${scope}, so there is nothing to total.`;
  if (a.op === "sum") return `The total value of resources ${scope} is ${formatAmount(b.value)}, across ${plural(b.count, "resource")}.`;
  return `The average cost of resources ${scope} is ${formatAmount(b.value)}, across ${plural(b.count, "resource")}.`;
}

function composeRank(a: Extract<QueryAnswer, { kind: "rank" }>, scope: string): string {
  const [top, next] = a.buckets;
  if (!top) return `There are no resources ${scope} to compare.`;
  const most = a.direction === "desc";
  if (a.by === "count") {
    const lead = `${top.key} has the ${most ? "most" : "fewest"} resources ${scope}, with ${top.count}.`;
    return next ? `${lead} Next is ${next.key} with ${next.count}.` : lead;
  }
  const lead = `${top.key} has the ${most ? "highest" : "lowest"} total value ${scope}, at ${formatAmount(top.value ?? 0)} over ${plural(top.count, "resource")}.`;
  return next ? `${lead} Next is ${next.key} at ${formatAmount(next.value ?? 0)}.` : lead;
}

function composeResources(a: Extract<QueryAnswer, { kind: "resources" }>, scope: string): string {
  if (a.rows.length === 0) return `I found no resources ${scope}.`;
  if (a.order) {
    const adj = a.order === "desc" ? "most expensive" : "least expensive";
    if (a.rows.length === 1) return `The ${adj} resource ${scope} is ${describeResource(a.rows[0])}.`;
    return `The ${a.rows.length} ${adj} resources ${scope} are ${joinList(a.rows.map(describeResource))}.`;
  }
  const shown = a.rows.map(describeResource).join("; ");
  const more = a.total > a.rows.length ? ` There are ${a.total - a.rows.length} more not listed here.` : "";
  return `I found ${plural(a.total, "resource")} ${scope}: ${shown}.${more}`;
}

export function composeStats(s: InventoryStats, scope: string): string {
  if (s.totalResources === 0) return `There are no resources ${scope} yet.`;
  const parts = [
    `There ${s.totalResources === 1 ? "is" : "are"} ${plural(s.totalResources, "resource")} ${scope}, worth ${formatAmount(s.totalCost)} in total, ` +
      `spread over ${plural(s.departments.length, "department")} and ${plural(s.locations.length, "location")}.`
  ];
  if (s.totalResources > 1) {
    parts.push(`The average cost is ${formatAmount(s.averageCost)} and the median is ${formatAmount(s.medianCost)}.`);
  }
  const topDept = s.departments[0];
  if (topDept) parts.push(`The highest-value department is ${topDept.name}, holding ${formatAmount(topDept.cost)}.`);
  const topLoc = s.locations[0];
  if (topLoc) parts.push(`The highest-value location is ${topLoc.name}, holding ${formatAmount(topLoc.cost)}.`);
  if (s.mostExpensive) parts.push(`The most valuable asset is ${describeResource(s.mostExpensive)}.`);
  if (s.leastExpensive && s.leastExpensive.id !== s.mostExpensive?.id) {
    parts.push(`The least valuable is ${describeResource(s.leastExpensive)}.`);
  }
  const b = s.costBands;
  parts.push(
    `By cost, ${b["0-10k"]} cost up to ₹10,000, ${b["10k-50k"]} over ₹10,000 and up to ₹50,000, ` +
      `${b["50k-100k"]} over ₹50,000 and up to ₹1,00,000, and ${b["100k+"]} over ₹1,00,000.`
  );
  parts.push(
    s.recentAdditions === 0
      ? `None were added in the last ${RECENT_DAYS} days.`
      : `${plural(s.recentAdditions, "resource")} ${s.recentAdditions === 1 ? "was" : "were"} added in the last ${RECENT_DAYS} days.`
  );
  if (s.oldest && s.newest && s.oldest.id !== s.newest.id) {
    parts.push(
      `The oldest record is "${s.oldest.description}", added on ${s.oldest.created_at.slice(0, 10)}, ` +
        `and the newest is "${s.newest.description}", added on ${s.newest.created_at.slice(0, 10)}.`
    );
  }
  return parts.join(" ");
}

export function composeHelp(s: InventoryStats): string {
  return (
    "I can answer questions about the inventory, such as how many resources a department has, " +
    "the total value at a location or the most expensive equipment. I can also create, update or delete " +
    'resources from instructions like "update cost to ₹1500 for all computers in CSE department". ' +
    `The inventory currently holds ${plural(s.totalResources, "resource")} worth ${formatAmount(s.totalCost)}.`
  );
}

function composeAnswer(a: QueryAnswer, scope: string): string {
  switch (a.kind) {
    case "aggregate": return composeAggregate(a, scope);
    case "rank": return composeRank(a, scope);
    case "resources": return composeResources(a, scope);
    case "summary": return composeStats(a.stats, scope);
    case "chat": return composeHelp(a.stats);
  }
}

function composeFailure(err: InterpreterError): string {
  switch (err.code) {
    case "unauthorized":
      return "Your role can only read the inventory, so nothing was changed. Ask an administrator for write access.";
    case "store_unavailable":
      return "The inventory database is unavailable right now. Nothing was changed; please try again shortly.";
    case "upstream_timeout":
      return "The language service took too long to respond, so the instruction was not applied. Please try again.";
    case "upstream_failed":
      return "The language service could not be reached, so the instruction was not applied. Please try again.";
    case "duplicate_service_tag":
      return "That service tag is already assigned to another resource, so nothing was saved.";
  }
}

export function composeResponse(outcome: Outcome): string {
  switch (outcome.kind) {
    case "incomplete": {
      const names = outcome.missing.map((f) => (label(f) === f ? f : `${label(f)} (${f})`));
      const action =
        outcome.draft.intent === "create" ? "create this resource" :
        outcome.draft.intent === "update" ? "update these resources" : "do that";
      return `I need a bit more information before I can ${action}. Please provide the ${joinList(names)}, then try again.`;
    }
    case "invalid": {
      const problems = outcome.issues.map((i) => {
        switch (i.problem) {
          case "negative": return `the ${label(i.field)} cannot be negative`;
          case "future": return `the ${label(i.field)} cannot be in the future`;
          case "unparseable": return `the ${label(i.field)} "${i.text}" is not a date I can read`;
        }
      });
      return `I can't apply this because ${joinList(problems)}. Nothing was changed.`;
    }
    case "created":
      return composeCreated(outcome.resource);
    case "updated": {
      const scope = describeFilter(outcome.filter);
      if (outcome.matched === 0) return `No resources ${scope} were found, so nothing was updated.`;
      const head = `I set the ${describeFields(outcome.fields)} for resources ${scope}.`;
      const counts = `${plural(outcome.matched, "resource")} matched and ${outcome.modified} ${outcome.modified === 1 ? "was" : "were"} changed`;
      const same = outcome.matched - outcome.modified;
      const tail = same > 0 ? `; ${same} already had ${same === 1 ? "that value" : "those values"}.` : ".";
      return `${head} ${counts}${tail}`;
    }
    case "deleted": {
      const scope = describeFilter(outcome.filter);
      if (outcome.deleted === 0) return `No resources ${scope} were found, so nothing was deleted.`;
      return `Deleted ${plural(outcome.deleted, "resource")} ${scope}.`;
    }
    case "confirmation_required": {
      const action = outcome.intent === "delete" ? "delete" : `set the ${describeFields(outcome.fields)} on`;
      return (
        `This instruction does not name which resources to change, so it would ${action} all ${plural(outcome.matched, "resource")} in the inventory. ` +
        "Nothing was changed. Confirm the request to apply it to every record, or add a department, location or service tag to narrow it."
      );
    }
    case "answer":
      return composeAnswer(outcome.answer, describeFilter(outcome.filter));
    case "failure":
      return composeFailure(outcome.error);
  }
}

/**
 * Guards text bound for the user: model output that is really a JSON
 * document (bare or fenced) is replaced with `fallback`.
 */
export function ensureProse(text: string, fallback: string): string {
  const trimmed = text.trim();
  if (!trimmed) return fallback;
  const unfenced = trimmed.replace(/^```[a-z]*\s*/i, "").replace(/\s*```$/, "");
  try {
    const parsed: unknown = JSON.parse(unfenced);
    if (typeof parsed === "object" && parsed !== null) return fallback;
  } catch {
    return trimmed;
  }
  return trimmed;
}
