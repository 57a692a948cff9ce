export type Role = "admin" | "manager" | "viewer";

export interface Caller {
  userId: string;
  role: Role;
}

export interface Resource {
  id: string;
  description: string;
  service_tag?: string;
  identification_number?: string;
  procurement_date: string; // YYYY-MM-DD
  cost: number;
  location: string;
  department: string;
  created_by: string;
  created_at: string; // ISO
  updated_at: string; // ISO
}

export type ResourceField =
  | "description"
  | "service_tag"
  | "identification_number"
  | "procurement_date"
  | "cost"
  | "location"
  | "department";

export type TextField = Exclude<ResourceField, "cost" | "procurement_date">;

/** Values a caller may write. Store-managed fields are excluded. */
export type ResourceFields = Partial<{
  description: string;
  service_tag: string;
  identification_number: string;
  procurement_date: string;
  cost: number;
  location: string;
  department: string;
}>;

export type NewResource = ResourceFields & {
  description: string;
  procurement_date: string;
  cost: number;
  location: string;
  department: string;
  created_by: string;
};

export type CostMatcher =
  | { op: "eq" | "gt" | "gte" | "lt" | "lte"; value: number }
  | { op: "between"; min: number; max: number };

export interface DateRange {
  from?: string; // inclusive, YYYY-MM-DD
  to?: string; // inclusive, YYYY-MM-DD
}

export interface ResourceFilter {
  description?: string; // substring
  service_tag?: string;
  identification_number?: string;
  location?: string;
  department?: string;
  cost?: CostMatcher;
  procurement_date?: DateRange;
}

export type SortField = "cost" | "procurement_date" | "updated_at";

export interface FindOptions {
  sort?: { field: SortField; direction: "asc" | "desc" };
  limit?: number;
}

export type GroupField = "department" | "location";
export type AggregateOp = "count" | "sum" | "avg" | "min" | "max";

export interface AggregateSpec {
  op: AggregateOp;
  filter: ResourceFilter;
  groupBy?: GroupField;
}

export interface AggregateBucket {
  key: string | null;
  count: number;
  value: number | null; // null for avg/min/max over an empty set
}

export interface UpdateResult {
  matched: number;
  modified: number;
}

export type Intent = "create" | "query" | "update" | "delete" | "chat";
export type DraftIntent = Exclude<Intent, "chat">;

export type QueryPlan =
  | { kind: "count"; groupBy?: GroupField }
  | { kind: "sum" | "avg"; groupBy?: GroupField }
  | { kind: "rank"; groupBy: GroupField; by: "count" | "sum"; direction: "asc" | "desc" }
  | { kind: "extreme"; direction: "asc" | "desc"; limit: number }
  | { kind: "list"; limit: number }
  | { kind: "summary" }
  | { kind: "chat" };

/** A value the instruction states but that cannot be read, e.g. "31/02/2024". */
export interface UnreadableValue {
  field: ResourceField;
  text: string;
}

export interface DraftOperation {
  intent: DraftIntent;
  filter: ResourceFilter;
  fields: ResourceFields;
  missing: string[];
  unreadable?: UnreadableValue[];
  query?: QueryPlan;
}

export type IdentifierPolicy = "either" | "optional";

export interface ResourceSchema {
  identifier: IdentifierPolicy;
}

export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}
