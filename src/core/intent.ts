import { Intent } from "../types/contracts.js";
import { normalizeText } from "./normalize.js";

type MutationIntent = "create" | "update" | "delete";

export const intentRules: Array<{ intent: MutationIntent; verbs: string[] }> = [
  { intent: "create", verbs: ["create", "add", "insert", "register", "record"] },
  { intent: "update", verbs: ["update", "change", "set", "modify", "edit", "move", "rename"] },
  { intent: "delete", verbs: ["delete", "remove", "drop", "discard", "dispose", "erase"] }
];

// longest first, stripped repeatedly ("please can you ...")
const POLITE_PREFIXES = [
  "i would like to", "i'd like to", "go ahead and", "i want to", "i need to", "we need to",
  "can you", "could you", "would you", "will you", "can u", "please", "kindly", "lets", "let's"
];

const QUERY_OPENERS = new Set([
  "how", "what", "what's", "whats", "which", "who", "when", "where", "why",
  "is", "are", "do", "does", "show", "list", "display", "give", "generate",
  "find", "get", "tell", "count", "sum", "total", "summarize", "summarise"
]);

// "add up the costs" asks for a sum
const NON_IMPERATIVE = [/^add up\b/];

export type Classification = {
  intent: Intent;
  ambiguous: boolean;
  verb?: string;
};

function stripPoliteness(t: string): string {
  let out = t.replace(/^[^a-z0-9]+/, "");
  let changed = true;
  while (changed) {
    changed = false;
    for (const p of POLITE_PREFIXES) {
      if (out === p || out.startsWith(p + " ") || out.startsWith(p + ",")) {
        out = out.slice(p.length).replace(/^[\s,]+/, "");
        changed = true;
      }
    }
  }
  return out;
}

function intentOfVerb(word: string): MutationIntent | undefined {
  return intentRules.find((r) => r.verbs.includes(word))?.intent;
}

function mentionsMutation(t: string, except?: MutationIntent): boolean {
  return intentRules
    .filter((r) => r.intent !== except)
    .some((r) => r.verbs.some((v) => new RegExp(`\\b${v}\\b`).test(t)));
}

/**
 * Only a leading imperative verb selects a mutation. Everything else goes to the
 * read-only path; `ambiguous` marks input that mentions a mutation verb anyway.
 */
export function classifyIntent(text: string): Classification {
  const t = stripPoliteness(normalizeText(text).replace(/\s+/g, " "));
  const first = t.match(/^[a-z']+/)?.[0] ?? "";
  const isQuestion = t.endsWith("?") || QUERY_OPENERS.has(first);

  const lead = NON_IMPERATIVE.some((re) => re.test(t)) ? undefined : intentOfVerb(first);
  if (lead) {
    // "delete X and add Y" is two instructions; refuse to pick one
    const tail = t.slice(first.length);
    const compound = intentRules
      .filter((r) => r.intent !== lead)
      .some((r) => r.verbs.some((v) => new RegExp(`\\b(?:and|then)\\s+${v}\\b`).test(tail)));
    if (!compound) return { intent: lead, ambiguous: false, verb: first };
    return { intent: isQuestion ? "query" : "chat", ambiguous: true };
  }

  if (isQuestion) return { intent: "query", ambiguous: mentionsMutation(t) };
  return { intent: "chat", ambiguous: mentionsMutation(t) };
}
