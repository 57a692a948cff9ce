import { addDays, format, isValid, parse, subDays } from "date-fns";
import { DateRange } from "../types/contracts.js";

const MONTH = String.raw`(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*`;

/** Regex source for an amount as written in an instruction: ₹1,500 / Rs. 80000 / 25k / 1.5 lakh */
export const AMOUNT_SRC = String.raw`(?:(?:₹|\brs\.?|\binr|\$)\s*)?\d[\d,]*(?:\.\d+)?(?:\s*(?:k|thousand|lakhs?|lacs?)\b)?`;

/** Regex source for a calendar date as written in an instruction. */
export const DATE_SRC = [
  String.raw`\d{4}-\d{2}-\d{2}`,
  String.raw`\d{1,2}[/.-]\d{1,2}[/.-]\d{4}`,
  String.raw`\d{1,2}(?:st|nd|rd|th)?\s+(?:of\s+)?${MONTH},?\s+\d{4}`,
  String.raw`${MONTH}\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}`,
  String.raw`\btoday\b`,
  String.raw`\byesterday\b`
].join("|");

const DATE_FORMATS = [
  "yyyy-MM-dd",
  "d/M/yyyy",
  "d-M-yyyy",
  "d.M.yyyy",
  "d MMMM yyyy",
  "d MMM yyyy",
  "MMMM d yyyy",
  "MMM d yyyy"
];

const MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  thousand: 1_000,
  lakh: 100_000,
  lakhs: 100_000,
  lac: 100_000,
  lacs: 100_000
};

export function parseAmount(raw: string): number | undefined {
  const s = raw
    .toLowerCase()
    .replace(/₹|\brs\.?|\binr|\$/g, "")
    .replace(/,/g, "")
    .trim();
  const m = s.match(/^(\d+(?:\.\d+)?)\s*(k|thousand|lakhs?|lacs?)?$/);
  if (!m) return undefined;
  const n = Number(m[1]) * (m[2] ? MULTIPLIERS[m[2]] : 1);
  if (!Number.isFinite(n)) return undefined;
  return Math.round(n * 100) / 100;
}

export function isoDate(d: Date): string {
  return format(d, "yyyy-MM-dd");
}

/** Canonicalises a written date to YYYY-MM-DD. Slashed dates are read day first. */
export function parseDate(raw: string, today: Date): string | undefined {
  const s = raw
    .toLowerCase()
    .replace(/(\d)(st|nd|rd|th)\b/g, "$1")
    .replace(/\bof\b/g, " ")
    .replace(/,/g, " ")
    .replace(/\bsept\b/g, "sep")
    .replace(/\s+/g, " ")
    .trim();

  if (s === "today") return isoDate(today);
  if (s === "yesterday") return isoDate(subDays(today, 1));

  for (const f of DATE_FORMATS) {
    const d = parse(s, f, today);
    if (isValid(d)) return isoDate(d);
  }
  return undefined;
}

export function dayBefore(iso: string): string {
  return isoDate(subDays(parse(iso, "yyyy-MM-dd", new Date()), 1));
}

export function dayAfter(iso: string): string {
  return isoDate(addDays(parse(iso, "yyyy-MM-dd", new Date()), 1));
}

/**
 * Resolves a relation ("in", "during", "on", "before", "after", "since")
 * and a year or written date into an inclusive procurement-date range.
 */
export function parseDateRange(relation: string, raw: string, today: Date): DateRange | undefined {
  const rel = relation.toLowerCase();
  if (/^\d{4}$/.test(raw.trim())) {
    const y = Number(raw);
    if (rel === "before") return { to: `${y - 1}-12-31` };
    if (rel === "after") return { from: `${y + 1}-01-01` };
    if (rel === "since") return { from: `${y}-01-01` };
    return { from: `${y}-01-01`, to: `${y}-12-31` };
  }
  const d = parseDate(raw, today);
  if (!d) return undefined;
  if (rel === "before") return { to: dayBefore(d) };
  if (rel === "after") return { from: dayAfter(d) };
  if (rel === "since") return { from: d };
  return { from: d, to: d };
}

const inr = new Intl.NumberFormat("en-IN", { maximumFractionDigits: 2 });

export function formatAmount(n: number): string {
  return `₹${inr.format(n)}`;
}
