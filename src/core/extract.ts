import { z } from "zod";
import {
  CostMatcher,
  DateRange,
  DraftOperation,
  GroupField,
  Intent,
  QueryPlan,
  ResourceFields,
  ResourceFilter,
  ResourceSchema,
  UnreadableValue
} from "../types/contracts.js";
import { flattenInstruction } from "./normalize.js";
import { AMOUNT_SRC, DATE_SRC, parseAmount, parseDate, parseDateRange } from "./values.js";
import { requiredMissing } from "./validate.js";

// Words that end an unquoted value ("Lab 3 for all ..." -> "Lab 3")
const STOP = [
  "for", "where", "whose", "which", "that", "with", "in", "at", "of", "and", "to", "from",
  "worth", "costing", "cost", "costs", "priced", "procured", "purchased", "bought", "acquired",
  "having", "under", "located", "department", "dept", "location", "service", "identification",
  "id", "on", "by", "than", "above", "below", "over", "between", "is", "are", "was", "were",
  "do", "does", "did", "have", "has", "there", "we", "currently", "me", "before", "after", "since"
].join("|");

const WORD = String.raw`(?:(?!(?:${STOP})\b)[A-Za-z0-9][\w&./#-]*)`;
// a value never starts with an article: "the ¦" must not read as "the"
const PHRASE = String.raw`(?!(?:the|an?)\s)${WORD}(?:\s+${WORD})*`;
const QUOTED = String.raw`'[^']+'|"[^"]+"`;
const VALUE = `(${QUOTED}|${PHRASE})`;
const TOKEN = String.raw`(${QUOTED}|[A-Za-z0-9][\w/-]*)`;
const AMOUNT = `(${AMOUNT_SRC})`;
const DATE = `(${DATE_SRC})`;
const YEAR = String.raw`((?:19|20)\d{2})`;
const CURRENCY_MARK = /₹|\$|\brs\b|\brs\.|\binr/i;

const SERVICE_TAG = String.raw`service[\s_-]*tag(?:\s*(?:no\.?|number|#))?`;
const ID_NUMBER = String.raw`(?:identification[\s_-]*(?:number|no\.?|#)?|id[\s_-]*(?:number|no\.?|#))`;
const DEPARTMENT = String.raw`(?:department|dept\.?)`;
const ACQUIRED = String.raw`(?:procured|purchased|bought|acquired)`;

const GENERIC_NOUNS = new Set([
  "resource", "asset", "item", "equipment", "record", "device", "thing", "entry", "entrie",
  "everything", "inventory", "stuff", "product", "one", "data"
]);

// "in total", "in stock" are not places
const NOT_A_PLACE = new Set(["total", "stock", "inventory", "all", "general", "the inventory", "use"]);

type Assignable = keyof ResourceFields;

const ASSIGNMENTS: Array<{ field: Assignable; names: string; value: string }> = [
  { field: "cost", names: "cost|price|value", value: AMOUNT },
  { field: "procurement_date", names: String.raw`procurement[\s_-]*date|purchase[\s_-]*date|date of procurement`, value: DATE },
  { field: "service_tag", names: SERVICE_TAG, value: TOKEN },
  { field: "identification_number", names: ID_NUMBER, value: TOKEN },
  { field: "department", names: DEPARTMENT, value: VALUE },
  { field: "location", names: "location|room", value: VALUE },
  { field: "description", names: "description|name|title", value: VALUE }
];

const COMPARATORS: Array<{ op: "gt" | "gte" | "lt" | "lte"; words: string }> = [
  { op: "lte", words: "at most|not more than|no more than|up to|maximum of" },
  { op: "gte", words: "at least|not less than|no less than|minimum of" },
  { op: "gt", words: "more than|greater than|higher than|costlier than|above|over|exceeding" },
  { op: "lt", words: "less than|lower than|cheaper than|below|under" }
];

const GROUPS: Record<string, GroupField> = {
  department: "department",
  departments: "department",
  dept: "department",
  location: "location",
  locations: "location",
  building: "location",
  buildings: "location"
};

function rx(src: string) {
  return new RegExp(src, "i");
}

export function cleanValue(raw: string): string {
  const t = raw.trim();
  if ((t.startsWith("'") && t.endsWith("'")) || (t.startsWith('"') && t.endsWith('"'))) {
    return t.slice(1, -1).trim();
  }
  return t.replace(/[.,;:!?/-]+$/, "").trim();
}

export function singularize(phrase: string): string {
  const words = phrase.trim().split(/\s+/);
  const last = words.pop() ?? "";
  let s = last;
  if (/ies$/i.test(last)) s = last.slice(0, -3) + "y";
  else if (/(?:ss|x|ch|sh)es$/i.test(last)) s = last.slice(0, -2);
  else if (/[^s]s$/i.test(last)) s = last.slice(0, -1);
  return [...words, s].join(" ");
}

function meaningfulNoun(raw: string): string | undefined {
  const v = cleanValue(raw).replace(/^(?:the|a|an|all|new|every|each|any|my|our)\s+/i, "");
  if (!v) return undefined;
  const single = singularize(v);
  if (GENERIC_NOUNS.has(single.toLowerCase())) return undefined;
  return single;
}

/**
 * Rule-based reader over one instruction. Each rule consumes the span it
 * matched so a phrase feeds at most one field.
 */
class Reader {
  work: string;
  unreadable: UnreadableValue[] = [];

  constructor(text: string, private today: Date) {
    this.work = ` ${flattenInstruction(text)} `;
  }

  peek(re: RegExp): RegExpMatchArray | null {
    return this.work.match(re);
  }

  take(m: RegExpMatchArray) {
    const at = m.index ?? 0;
    this.work = this.work.slice(0, at) + " ¦ " + this.work.slice(at + m[0].length);
  }

  consume(re: RegExp): RegExpMatchArray | null {
    const m = this.peek(re);
    if (m) this.take(m);
    return m;
  }

  amount(raw: string): number | undefined {
    return parseAmount(raw);
  }

  date(raw: string): string | undefined {
    const v = parseDate(raw, this.today);
    if (v === undefined) this.unreadable.push({ field: "procurement_date", text: raw.trim() });
    return v;
  }

  serviceTag(): string | undefined {
    const m = this.consume(rx(String.raw`\b${SERVICE_TAG}\s*(?:is|=|:|of)?\s*${TOKEN}`));
    return m ? cleanValue(m[1]) : undefined;
  }

  identificationNumber(): string | undefined {
    const m = this.consume(rx(String.raw`\b${ID_NUMBER}\s*(?:is|=|:|of)?\s*${TOKEN}`));
    return m ? cleanValue(m[1]) : undefined;
  }

  department(): string | undefined {
    const m =
      this.consume(rx(String.raw`\b(?:in|of|for|from|under|within|belonging to)\s+(?:the\s+)?${VALUE}\s+${DEPARTMENT}(?=\W|$)`)) ??
      this.consume(rx(String.raw`\b${DEPARTMENT}\s*(?:is|=|:|of)?\s*${VALUE}`));
    return m ? cleanValue(m[1]) : undefined;
  }

  location(): string | undefined {
    const labelled =
      this.consume(rx(String.raw`\blocation\s*(?:is|=|:|of)?\s*(?:the\s+)?${VALUE}`)) ??
      this.consume(rx(String.raw`\blocated\s+(?:in|at)\s+(?:the\s+)?${VALUE}`));
    if (labelled) return cleanValue(labelled[1]);

    const re = rx(String.raw`\b(?:in|at|inside)\s+(?:the\s+)?${VALUE}`);
    const m = this.peek(re);
    if (!m) return undefined;
    const v = cleanValue(m[1]);
    if (NOT_A_PLACE.has(v.toLowerCase()) || /^\d{4}$/.test(v)) return undefined;
    this.take(m);
    return v;
  }

  createCost(): number | undefined {
    const m =
      this.consume(rx(String.raw`\b(?:with\s+(?:a\s+)?)?(?:cost|price|value|worth|costing|priced(?:\s+at)?|valued(?:\s+at)?)\s*(?:of|is|=|:|at)?\s*${AMOUNT}`)) ??
      this.consume(rx(String.raw`\b(?:for|at)\s+((?:₹|\brs\.?|\binr|\$)\s*\d[\d,]*(?:\.\d+)?(?:\s*(?:k|thousand|lakhs?|lacs?)\b)?)`));
    return m ? this.amount(m[1]) : undefined;
  }

  procurementDate(): string | undefined {
    const m =
      this.consume(rx(String.raw`\b(?:${ACQUIRED}|procurement[\s_-]*date|purchase[\s_-]*date|dated)\s*(?:on|is|=|:|of)?\s*${DATE}`));
    return m ? this.date(m[1]) : undefined;
  }

  costFilter(): CostMatcher | undefined {
    const between = this.consume(rx(String.raw`\b(?:(?:cost|costs|costing|priced|worth|valued)\s+)?between\s+${AMOUNT}\s+and\s+${AMOUNT}`));
    if (between) {
      const a = this.amount(between[1]);
      const b = this.amount(between[2]);
      if (a !== undefined && b !== undefined) return { op: "between", min: Math.min(a, b), max: Math.max(a, b) };
    }

    for (const c of COMPARATORS) {
      const re = rx(String.raw`\b(?:(cost|costs|costing|priced|price|worth|valued|value)\s+(?:is\s+|of\s+|at\s+)?)?(?:${c.words})\s+${AMOUNT}`);
      const m = this.peek(re);
      if (!m) continue;
      // "over 5 laptops" is not a price
      if (!m[1] && !CURRENCY_MARK.test(m[2])) continue;
      const value = this.amount(m[2]);
      if (value === undefined) continue;
      this.take(m);
      return { op: c.op, value };
    }

    const exact = this.consume(rx(String.raw`\b(?:costing|priced at|worth|cost of|cost is|cost =|with cost|valued at)\s+${AMOUNT}`));
    if (exact) {
      const value = this.amount(exact[1]);
      if (value !== undefined) return { op: "eq", value };
    }
    return undefined;
  }

  dateFilter(): DateRange | undefined {
    const between = this.consume(rx(String.raw`\b(?:${ACQUIRED}\s+)?between\s+${DATE}\s+and\s+${DATE}`));
    if (between) {
      const a = this.date(between[1]);
      const b = this.date(between[2]);
      if (a && b) return a <= b ? { from: a, to: b } : { from: b, to: a };
    }

    const m =
      this.consume(rx(String.raw`\b${ACQUIRED}\s+(on|in|before|after|since|during)\s+(?:the\s+year\s+)?(${DATE_SRC}|(?:19|20)\d{2})\b`)) ??
      this.consume(rx(String.raw`\b(before|after|since)\s+(?:the\s+year\s+)?(${DATE_SRC}|(?:19|20)\d{2})\b`)) ??
      this.consume(rx(String.raw`\b(in|during)\s+(?:the\s+year\s+)?${YEAR}\b`));
    if (!m) return undefined;

    const range = parseDateRange(m[1], m[2], this.today);
    if (!range) this.unreadable.push({ field: "procurement_date", text: m[2].trim() });
    return range;
  }

  /** The object noun of a command or question: "all computers", "how many laptops". */
  describedNoun(patterns: string[]): string | undefined {
    for (const p of patterns) {
      const m = this.peek(rx(p));
      if (!m) continue;
      const noun = meaningfulNoun(m[1]);
      this.take(m);
      if (noun) return noun;
    }
    return undefined;
  }
}

function readFilter(r: Reader, nounPatterns: string[]): ResourceFilter {
  const filter: ResourceFilter = {};
  const tag = r.serviceTag();
  if (tag) filter.service_tag = tag;
  const idn = r.identificationNumber();
  if (idn) filter.identification_number = idn;
  const dates = r.dateFilter();
  if (dates) filter.procurement_date = dates;
  const cost = r.costFilter();
  if (cost) filter.cost = cost;
  const dept = r.department();
  if (dept) filter.department = dept;
  const loc = r.location();
  if (loc) filter.location = loc;
  const noun = r.describedNoun(nounPatterns);
  if (noun) filter.description = noun;
  return filter;
}

function readAssignments(r: Reader): ResourceFields {
  const fields: ResourceFields = {};
  for (const a of ASSIGNMENTS) {
    const m =
      r.consume(rx(String.raw`\b(?:the\s+)?(?:${a.names})\s+(?:to|=|as|into)\s+(?:the\s+)?${a.value}`)) ??
      r.consume(rx(String.raw`\bset\s+(?:the\s+)?(?:${a.names})\s*(?:=|:)?\s*(?:the\s+)?${a.value}`));
    if (!m) continue;
    const raw = m[1];
    if (a.field === "cost") {
      const v = r.amount(raw);
      if (v !== undefined) fields.cost = v;
    } else if (a.field === "procurement_date") {
      const v = r.date(raw);
      if (v) fields.procurement_date = v;
    } else {
      const v = cleanValue(raw);
      if (v) fields[a.field] = v;
    }
  }
  return fields;
}

const VERB_OBJECT = (verbs: string) =>
  String.raw`\b(?:${verbs})\s+(?:all\s+|the\s+|a\s+|an\s+|every\s+|each\s+|any\s+|new\s+)*${VALUE}`;

function extractCreate(r: Reader): ResourceFields {
  const fields: ResourceFields = {};
  const named = r.consume(rx(String.raw`\b(?:named|called|titled|description)\s*(?:is|=|:|as)?\s*${VALUE}`));

  const tag = r.serviceTag();
  if (tag) fields.service_tag = tag;
  const idn = r.identificationNumber();
  if (idn) fields.identification_number = idn;
  const date = r.procurementDate();
  if (date) fields.procurement_date = date;
  const cost = r.createCost();
  if (cost !== undefined) fields.cost = cost;
  const dept = r.department();
  if (dept) fields.department = dept;
  const loc = r.location();
  if (loc) fields.location = loc;

  if (named) {
    fields.description = cleanValue(named[1]);
  } else {
    const m = r.peek(rx(VERB_OBJECT("create|add|insert|register|record")));
    if (m) {
      const v = cleanValue(m[1]);
      if (!GENERIC_NOUNS.has(singularize(v).toLowerCase())) fields.description = v;
      r.take(m);
    }
  }
  return fields;
}

function extractUpdate(r: Reader): { fields: ResourceFields; filter: ResourceFilter } {
  const renamed = r.consume(rx(String.raw`\brename\s+(?:the\s+)?${VALUE}\s+(?:to|as)\s+(?:the\s+)?${VALUE}`));
  const fields = readAssignments(r);
  const filter: ResourceFilter = {};

  if (renamed) {
    fields.description = cleanValue(renamed[2]);
    filter.description = cleanValue(renamed[1]);
  }

  if (fields.location === undefined) {
    // "move the projectors in ECE department to Room 101"
    const moved = r.peek(rx(String.raw`\bmove\b`)) && r.consume(rx(String.raw`\bto\s+(?:the\s+)?${VALUE}`));
    if (moved) fields.location = cleanValue(moved[1]);
  }

  const rest = readFilter(r, [
    VERB_OBJECT("update|change|set|modify|edit|move"),
    String.raw`\b(?:for|of)\s+(?:all\s+|the\s+|every\s+|each\s+|any\s+)*${VALUE}`
  ]);
  return { fields, filter: { ...rest, ...filter } };
}

const VALUE_WORDS = /^(?:(?:total|combined|overall)\s+)?(?:value|cost|worth|spend|spending|amount|expensive|money)\w*(?:\s+(.+))?$/i;

/**
 * Reads the question kind. A plan phrase that names its object ("how many
 * laptops", "the most expensive projector") hands that noun back, since the
 * phrase is consumed here and the filter reader never sees it.
 */
function readQueryPlan(r: Reader): { plan: QueryPlan; noun?: string } {
  const group = r.consume(rx(String.raw`\b(?:by|per|for each|for every|in each|in every|across|each|every)\s+(department|dept|location|building)s?\b`));
  const groupBy = group ? GROUPS[group[1].toLowerCase()] : undefined;

  const rank = r.consume(rx(String.raw`\bwhich\s+(departments?|dept|locations?|buildings?)\s+(?:has|have|holds?|owns?|with|contains?)\s+(?:the\s+)?(most|highest|largest|biggest|greatest|fewest|least|lowest|smallest)\b(?:\s+(?:number of\s+)?${VALUE})?`));
  if (rank) {
    const tail = rank[3] ? cleanValue(rank[3]) : "";
    const valued = tail.match(VALUE_WORDS);
    const direction = /^(fewest|least|lowest|smallest)$/i.test(rank[2]) ? "asc" : "desc";
    return {
      plan: { kind: "rank", groupBy: GROUPS[rank[1].toLowerCase()], by: valued ? "sum" : "count", direction },
      noun: meaningfulNoun(valued ? valued[1] ?? "" : tail)
    };
  }

  if (r.consume(rx(String.raw`\b(summary|summarize|summarise|overview|report|breakdown|statistics|stats)\b`))) {
    return { plan: groupBy ? { kind: "sum", groupBy } : { kind: "summary" } };
  }

  const extreme = r.consume(rx(String.raw`\b(?:top\s+(\d+)\s+)?(?:(\d+)\s+)?(most expensive|costliest|priciest|highest[- ]cost|highest[- ]value|cheapest|least expensive|lowest[- ]cost)\b(?:\s+${VALUE})?`));
  if (extreme) {
    const n = Number(extreme[1] ?? extreme[2] ?? 1);
    const direction = /cheapest|least|lowest/i.test(extreme[3]) ? "asc" : "desc";
    return {
      plan: { kind: "extreme", direction, limit: Math.min(Math.max(n, 1), 50) },
      noun: extreme[4] ? meaningfulNoun(extreme[4]) : undefined
    };
  }

  if (r.consume(rx(String.raw`\b(average|avg|mean)\b(?:\s+(?:cost|price|value))?`))) return { plan: { kind: "avg", groupBy } };

  if (
    r.consume(rx(String.raw`\b(?:total|sum|combined|overall|aggregate)\s+(?:of\s+(?:the\s+)?)?(?:value|cost|worth|spend|spending|amount|price)s?\b`)) ??
    r.consume(rx(String.raw`\bhow much\b(?:\s+(?:is|are|was|were|did|do))?(?:\s+(?:worth|spent|cost|value))?`)) ??
    r.consume(rx(String.raw`\b(?:value|worth)\s+of\b`)) ??
    r.consume(rx(String.raw`\badd up\b`))
  ) {
    return { plan: { kind: "sum", groupBy } };
  }

  const counted = r.consume(rx(String.raw`\b(?:how many|number of|count(?: of)?)\b(?:\s+(?:all\s+|the\s+|our\s+)*${VALUE})?`));
  if (counted) return { plan: { kind: "count", groupBy }, noun: counted[1] ? meaningfulNoun(counted[1]) : undefined };
  if (groupBy) return { plan: { kind: "count", groupBy } };

  if (r.peek(rx(String.raw`\b(?:show|list|display|find|get|give|which|what)\b`)) && r.peek(rx(String.raw`\b(?:resources?|assets?|items?|equipment|devices?|in|at|with|department|location|service|costing|procured|purchased)\b`))) {
    return { plan: { kind: "list", limit: 20 } };
  }
  return { plan: { kind: "chat" } };
}

function extractQuery(r: Reader): { plan: QueryPlan; filter: ResourceFilter } {
  const { plan, noun } = readQueryPlan(r);
  if (plan.kind === "chat") return { plan, filter: {} };
  const filter = readFilter(r, [
    String.raw`\b(?:show|list|display|find|get|give)\s+(?:me\s+|us\s+)?(?:all\s+|the\s+|every\s+|any\s+)*${VALUE}`,
    String.raw`\b(?:of|for)\s+(?:all\s+|the\s+|every\s+|each\s+|any\s+|our\s+)*${VALUE}`,
    String.raw`\ball\s+(?:the\s+)?${VALUE}`
  ]);
  if (noun && filter.description === undefined) filter.description = noun;
  return { plan, filter };
}

/**
 * Turns one instruction into a draft. Values come only from the instruction
 * text; anything required that is not there is listed in `missing`.
 */
export function extractDraft(text: string, intent: Intent, schema: ResourceSchema, today: Date = new Date()): DraftOperation {
  const r = new Reader(text, today);

  let draft: DraftOperation;
  switch (intent) {
    case "create":
      draft = { intent: "create", filter: {}, fields: extractCreate(r), missing: [] };
      break;
    case "update": {
      const { fields, filter } = extractUpdate(r);
      draft = { intent: "update", filter, fields, missing: [] };
      break;
    }
    case "delete":
      draft = {
        intent: "delete",
        filter: readFilter(r, [VERB_OBJECT("delete|remove|drop|discard|dispose(?:\\s+of)?|erase")]),
        fields: {},
        missing: []
      };
      break;
    case "query":
    case "chat": {
      const { plan, filter } = extractQuery(r);
      draft = { intent: "query", filter, fields: {}, missing: [], query: plan };
      break;
    }
  }

  draft.missing = requiredMissing(draft, schema);
  if (r.unreadable.length > 0) draft.unreadable = r.unreadable;
  return draft;
}

const suggestedText = z.string().trim().min(1).nullish();

/** Shape a language service is asked to return for a create instruction. */
export const SuggestionSchema = z.object({
  description: suggestedText,
  service_tag: suggestedText,
  identification_number: suggestedText,
  cost: z.union([z.number(), z.string()]).nullish(),
  location: suggestedText,
  department: suggestedText,
  procurement_date: suggestedText
});

function amountsIn(instruction: string): number[] {
  const out: number[] = [];
  for (const m of instruction.matchAll(new RegExp(AMOUNT_SRC, "gi"))) {
    const v = parseAmount(m[0]);
    if (v !== undefined) out.push(v);
  }
  return out;
}

function datesIn(instruction: string, today: Date): string[] {
  const out: string[] = [];
  for (const m of instruction.matchAll(new RegExp(DATE_SRC, "gi"))) {
    const v = parseDate(m[0], today);
    if (v) out.push(v);
  }
  return out;
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** True when `value` appears in `text` as whole tokens, not inside a longer word. */
export function occursAsTokens(text: string, value: string): boolean {
  const body = value.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  if (!body) return false;
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "iu").test(text);
}

/**
 * Folds a language-service suggestion into a create draft. Only empty
 * fields are filled, and only with values that occur in the instruction.
 */
export function mergeSuggestion(
  draft: DraftOperation,
  suggestion: unknown,
  instruction: string,
  schema: ResourceSchema,
  today: Date = new Date()
): DraftOperation {
  if (draft.intent !== "create") return draft;
  const parsed = SuggestionSchema.safeParse(suggestion);
  if (!parsed.success) return draft;

  const s = parsed.data;
  const haystack = flattenInstruction(instruction);
  const fields: ResourceFields = { ...draft.fields };

  for (const key of ["description", "service_tag", "identification_number", "location", "department"] as const) {
    const v = s[key];
    if (fields[key] !== undefined || !v) continue;
    const value = cleanValue(v);
    if (value && occursAsTokens(haystack, value)) fields[key] = value;
  }

  if (fields.cost === undefined && s.cost !== undefined && s.cost !== null) {
    const v = typeof s.cost === "number" ? s.cost : parseAmount(s.cost);
    if (v !== undefined && amountsIn(instruction).includes(v)) fields.cost = v;
  }

  if (fields.procurement_date === undefined && s.procurement_date) {
    const v = parseDate(s.procurement_date, today);
    if (v && datesIn(instruction, today).includes(v)) fields.procurement_date = v;
  }

  const merged: DraftOperation = { ...draft, fields };
  return { ...merged, missing: requiredMissing(merged, schema) };
}
