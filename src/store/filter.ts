import {
  AggregateBucket,
  AggregateSpec,
  CostMatcher,
  FindOptions,
  Resource,
  ResourceField,
  ResourceFields,
  ResourceFilter
} from "../types/contracts.js";

const EQUALITY_FIELDS = ["service_tag", "identification_number", "location", "department"] as const;

function fold(s: string | undefined) {
  return (s ?? "").trim().toLowerCase();
}

export function isEmptyFilter(filter: ResourceFilter): boolean {
  return Object.values(filter).every((v) => v === undefined);
}

export function matchesCost(cost: number, m: CostMatcher): boolean {
  switch (m.op) {
    case "eq": return cost === m.value;
    case "gt": return cost > m.value;
    case "gte": return cost >= m.value;
    case "lt": return cost < m.value;
    case "lte": return cost <= m.value;
    case "between": return cost >= m.min && cost <= m.max;
  }
}

export function matchesFilter(r: Resource, filter: ResourceFilter): boolean {
  for (const field of EQUALITY_FIELDS) {
    const want = filter[field];
    if (want !== undefined && fold(r[field]) !== fold(want)) return false;
  }
  if (filter.description !== undefined && !fold(r.description).includes(fold(filter.description))) return false;
  if (filter.cost && !matchesCost(r.cost, filter.cost)) return false;

  const range = filter.procurement_date;
  if (range) {
    // YYYY-MM-DD compares correctly as a string
    if (range.from && r.procurement_date < range.from) return false;
    if (range.to && r.procurement_date > range.to) return false;
  }
  return true;
}

export function applyFindOptions(rows: Resource[], opts: FindOptions = {}): Resource[] {
  let out = rows;
  if (opts.sort) {
    const { field, direction } = opts.sort;
    const sign = direction === "asc" ? 1 : -1;
    out = [...out].sort((a, b) => {
      const av = a[field];
      const bv = b[field];
      if (av === bv) return a.id.localeCompare(b.id);
      const cmp = typeof av === "number" && typeof bv === "number" ? av - bv : String(av).localeCompare(String(bv));
      return cmp * sign;
    });
  }
  if (opts.limit !== undefined) out = out.slice(0, Math.max(0, opts.limit));
  return out;
}

const WRITABLE_FIELDS: ResourceField[] = [
  "description",
  "service_tag",
  "identification_number",
  "procurement_date",
  "cost",
  "location",
  "department"
];

/** Returns the merged record, or null when every field already holds the target value. */
export function applyFields(r: Resource, fields: ResourceFields, now: string): Resource | null {
  const changed = WRITABLE_FIELDS.some((k) => fields[k] !== undefined && fields[k] !== r[k]);
  if (!changed) return null;
  return {
    ...r,
    description: fields.description ?? r.description,
    service_tag: fields.service_tag ?? r.service_tag,
    identification_number: fields.identification_number ?? r.identification_number,
    procurement_date: fields.procurement_date ?? r.procurement_date,
    cost: fields.cost ?? r.cost,
    location: fields.location ?? r.location,
    department: fields.department ?? r.department,
    updated_at: now
  };
}

function reduce(rows: Resource[], op: AggregateSpec["op"]): number | null {
  if (op === "count") return rows.length;
  const costs = rows.map((r) => r.cost);
  const sum = costs.reduce((acc, c) => acc + c, 0);
  if (op === "sum") return sum;
  if (costs.length === 0) return null;
  if (op === "avg") return sum / costs.length;
  return op === "min" ? Math.min(...costs) : Math.max(...costs);
}

export function aggregateResources(rows: Resource[], agg: AggregateSpec): AggregateBucket[] {
  const matched = rows.filter((r) => matchesFilter(r, agg.filter));
  if (!agg.groupBy) {
    return [{ key: null, count: matched.length, value: reduce(matched, agg.op) }];
  }

  const groups = new Map<string, Resource[]>();
  for (const r of matched) {
    const key = r[agg.groupBy] || "Unknown";
    const arr = groups.get(key) ?? [];
    arr.push(r);
    groups.set(key, arr);
  }
  return [...groups.entries()]
    .map(([key, members]) => ({ key, count: members.length, value: reduce(members, agg.op) }))
    .sort((a, b) => a.key.localeCompare(b.key));
}
