export { createInterpreter } from "./plugin/createInterpreter.js";
export type { Interpreter, InterpreterResponse, ResponseData } from "./plugin/createInterpreter.js";
export { makeRoutes, makeAiRoutes, makeErrorHandler } from "./api/routes.js";
export { loadConfig } from "./config.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export type { ResourceStore } from "./store/store.js";
export { HttpLanguageService } from "./llm/client.js";
export type { LanguageService } from "./llm/types.js";
export { classifyIntent } from "./core/intent.js";
export { extractDraft, mergeSuggestion } from "./core/extract.js";
export { validateDraft, DEFAULT_SCHEMA } from "./core/validate.js";
export { computeInventoryStats } from "./core/stats.js";
export * from "./core/errors.js";
export type {
  Caller,
  Role,
  Resource,
  ResourceFilter,
  ResourceFields,
  DraftOperation,
  QueryPlan,
  ResourceSchema,
  ChatTurn
} from "./types/contracts.js";
