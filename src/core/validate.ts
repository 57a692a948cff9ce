import { DraftOperation, ResourceSchema } from "../types/contracts.js";
import { isEmptyFilter } from "../store/filter.js";
import { isoDate } from "./values.js";

export const IDENTIFIER_FIELD = "service_tag_or_identification_number";
export const UPDATE_FIELDS_FIELD = "fields_to_update";

export const DEFAULT_SCHEMA: ResourceSchema = { identifier: "either" };

export type ValidationIssue =
  | { field: string; problem: "negative" | "future" }
  | { field: string; problem: "unparseable"; text: string };

export type ValidationResult =
  | { kind: "complete"; draft: DraftOperation; unscoped: boolean }
  | { kind: "incomplete"; draft: DraftOperation; missing: string[] }
  | { kind: "invalid"; draft: DraftOperation; issues: ValidationIssue[] };

function filled(v: string | undefined) {
  return v !== undefined && v.trim() !== "";
}

export function requiredMissing(draft: DraftOperation, schema: ResourceSchema): string[] {
  const f = draft.fields;
  if (draft.intent === "create") {
    const missing: string[] = [];
    if (!filled(f.description)) missing.push("description");
    if (schema.identifier === "either" && !filled(f.service_tag) && !filled(f.identification_number)) {
      missing.push(IDENTIFIER_FIELD);
    }
    if (f.cost === undefined) missing.push("cost");
    if (!filled(f.location)) missing.push("location");
    if (!filled(f.department)) missing.push("department");
    return missing;
  }
  if (draft.intent === "update" && Object.values(f).every((v) => v === undefined)) {
    return [UPDATE_FIELDS_FIELD];
  }
  return [];
}

/**
 * Pure completion gate. The only time-dependent input is `today`, which
 * fills the procurement date on create and bounds it from above.
 */
export function validateDraft(draft: DraftOperation, schema: ResourceSchema, today: Date = new Date()): ValidationResult {
  // a stated value that cannot be read is never replaced by a default
  if (draft.unreadable && draft.unreadable.length > 0) {
    const issues: ValidationIssue[] = draft.unreadable.map((u): ValidationIssue => ({ field: u.field, problem: "unparseable", text: u.text }));
    return { kind: "invalid", draft, issues };
  }

  const missing = requiredMissing(draft, schema);
  if (missing.length > 0) return { kind: "incomplete", draft: { ...draft, missing }, missing };

  const issues: ValidationIssue[] = [];
  const f = draft.fields;
  const todayIso = isoDate(today);
  if (f.cost !== undefined && (!Number.isFinite(f.cost) || f.cost < 0)) issues.push({ field: "cost", problem: "negative" });
  if (f.procurement_date !== undefined && f.procurement_date > todayIso) {
    issues.push({ field: "procurement_date", problem: "future" });
  }
  if (issues.length > 0) return { kind: "invalid", draft, issues };

  let complete: DraftOperation = { ...draft, missing: [] };
  if (draft.intent === "create" && f.procurement_date === undefined) {
    complete = { ...complete, fields: { ...f, procurement_date: todayIso } };
  }
  const destructive = draft.intent === "update" || draft.intent === "delete";
  return { kind: "complete", draft: complete, unscoped: destructive && isEmptyFilter(draft.filter) };
}
