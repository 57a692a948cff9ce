import { ChatTurn } from "../types/contracts.js";
import { safeJsonParse } from "./client.js";
import { LanguageService } from "./types.js";

const FIELD_SYSTEM =
  "You extract fields for a campus equipment inventory record. Return ONLY valid JSON. No prose, no markdown.\n" +
  'Schema: {"description": string|null, "service_tag": string|null, "identification_number": string|null, ' +
  '"cost": number|null, "location": string|null, "department": string|null, "procurement_date": "YYYY-MM-DD"|null}\n' +
  "Rules:\n" +
  "- copy values exactly as they are written in the instruction\n" +
  "- use null for anything the instruction does not state; never guess";

/**
 * Asks the language service for the fields a create instruction left
 * unresolved. Returns the parsed JSON (unvalidated) or null.
 */
export async function suggestFields(language: LanguageService, instruction: string, missing: string[]): Promise<unknown> {
  const prompt =
    `Instruction: ${instruction}\n` +
    `Fields not yet found: ${missing.join(", ")}`;
  const out = await language.infer(prompt, { system: FIELD_SYSTEM });
  return safeJsonParse(out);
}

const CHAT_SYSTEM =
  "You are the assistant of a campus equipment inventory. Answer in two or three plain sentences of prose. " +
  "Use only the inventory facts you are given; if they do not answer the question, say so. " +
  "Never answer with JSON, code or tables. Amounts are in Indian rupees (₹).";

/** Free-form inventory question, answered from the supplied facts only. */
export async function answerQuestion(
  language: LanguageService,
  message: string,
  history: ChatTurn[],
  facts: string
): Promise<string> {
  const transcript = history
    .slice(-6)
    .map((t) => `${t.role === "user" ? "User" : "Assistant"}: ${t.content}`)
    .join("\n");
  const prompt =
    `Inventory facts: ${facts}\n\n` +
    (transcript ? `Conversation so far:\n${transcript}\n\n` : "") +
    `User: ${message}`;
  return language.infer(prompt, { system: CHAT_SYSTEM });
}
