import pino from "pino";
import type { Logger } from "pino";
import { ResourceStore } from "../store/store.js";
import { classifyIntent } from "../core/intent.js";
import { extractDraft, mergeSuggestion } from "../core/extract.js";
import { validateDraft, DEFAULT_SCHEMA } from "../core/validate.js";
import { canWrite, createExecutor, ExecutionResult } from "../core/executor.js";
import { composeHelp, composeResponse, composeStats, ensureProse } from "../core/compose.js";
import { ErrorCode, isInterpreterError, UnauthorizedError } from "../core/errors.js";
import { LanguageService } from "../llm/types.js";
import { answerQuestion, suggestFields } from "../llm/suggest.js";
import { Caller, ChatTurn, Intent, ResourceSchema } from "../types/contracts.js";

export type ResponseStatus = "ok" | "incomplete" | "error";

/** Structured summary for logs and telemetry. Not shown to the user. */
export type ResponseData = {
  intent: Intent;
  reason?: "missing_fields" | "invalid" | "confirmation_required";
  missing?: string[];
  resourceId?: string;
  matched?: number;
  modified?: number;
  deleted?: number;
  code?: ErrorCode;
  retryable?: boolean;
};

export type InterpreterResponse = {
  status: ResponseStatus;
  message: string;
  data?: ResponseData;
};

function summarize(intent: Intent, result: ExecutionResult): ResponseData {
  switch (result.kind) {
    case "created":
      return { intent, resourceId: result.resource.id };
    case "updated":
      return { intent, matched: result.matched, modified: result.modified };
    case "deleted":
      return { intent, deleted: result.deleted };
    case "confirmation_required":
      return { intent, reason: "confirmation_required", matched: result.matched };
    case "answer":
      return { intent };
  }
}

export function createInterpreter(args: {
  store: ResourceStore;
  schema?: ResourceSchema;
  language?: LanguageService;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const schema = args.schema ?? DEFAULT_SCHEMA;
  const now = args.now ?? (() => new Date());
  const executor = createExecutor({ store: args.store, logger: log, now });

  async function run(text: string, caller: Caller, intent: Intent, confirm: boolean): Promise<InterpreterResponse> {
    const today = now();

    if (intent !== "query" && intent !== "chat" && !canWrite(caller.role)) {
      throw new UnauthorizedError(caller.role);
    }

    let draft = extractDraft(text, intent, schema, today);
    if (draft.intent === "create" && draft.missing.length > 0 && args.language) {
      const suggestion = await suggestFields(args.language, text, draft.missing);
      draft = mergeSuggestion(draft, suggestion, text, schema, today);
      log.debug({ missing: draft.missing }, "suggestion merged");
    }

    const checked = validateDraft(draft, schema, today);
    if (checked.kind === "incomplete") {
      return {
        status: "incomplete",
        message: composeResponse(checked),
        data: { intent, reason: "missing_fields", missing: checked.missing }
      };
    }
    if (checked.kind === "invalid") {
      return { status: "incomplete", message: composeResponse(checked), data: { intent, reason: "invalid" } };
    }

    const result = await executor.execute(checked.draft, caller, { confirmed: confirm });
    return {
      status: result.kind === "confirmation_required" ? "incomplete" : "ok",
      message: composeResponse(result),
      data: summarize(intent, result)
    };
  }

  async function guard(intent: Intent, caller: Caller, fn: () => Promise<InterpreterResponse>): Promise<InterpreterResponse> {
    try {
      return await fn();
    } catch (err) {
      if (!isInterpreterError(err)) throw err;
      log.warn({ err, code: err.code, userId: caller.userId, intent }, "instruction failed");
      return {
        status: "error",
        message: composeResponse({ kind: "failure", error: err }),
        data: { intent, code: err.code, retryable: err.retryable }
      };
    }
  }

  /**
   * One natural-language instruction, end to end. Unscoped updates and
   * deletes only run with `confirm`.
   */
  async function handleInstruction(
    text: string,
    caller: Caller,
    opts: { confirm?: boolean } = {}
  ): Promise<InterpreterResponse> {
    const { intent, ambiguous } = classifyIntent(text);
    log.info({ userId: caller.userId, intent, ambiguous }, "instruction received");
    return guard(intent, caller, () => run(text, caller, intent, opts.confirm ?? false));
  }

  /**
   * Chat turn. Mutations and recognised questions take the instruction path;
   * anything else is answered from inventory facts, by the language service
   * when one is configured.
   */
  async function answerChat(message: string, caller: Caller, history: ChatTurn[] = []): Promise<InterpreterResponse> {
    const { intent } = classifyIntent(message);
    if (intent !== "chat") return handleInstruction(message, caller);

    return guard(intent, caller, async () => {
      const draft = extractDraft(message, intent, schema, now());
      const result = await executor.execute(draft, caller);
      const composed = composeResponse(result);
      const language = args.language;

      if (!language || result.kind !== "answer" || result.answer.kind !== "chat") {
        return { status: "ok", message: composed, data: { intent } };
      }

      const fallback = composeHelp(result.answer.stats);
      const facts = composeStats(result.answer.stats, "in the inventory");
      const reply = await answerQuestion(language, message, history, facts);
      return { status: "ok", message: ensureProse(reply, fallback), data: { intent } };
    });
  }

  return { handleInstruction, answerChat };
}

export type Interpreter = ReturnType<typeof createInterpreter>;
