export { CompletionClient } from "./core/completion-client.js";
export type { CompletionClientOptions } from "./core/completion-client.js";
export { ResponseCache } from "./memory/response-cache.js";
export type { StoreResult } from "./memory/response-cache.js";
export { loadSettings, SettingsSchema } from "./memory/settings.js";
export type { Settings } from "./memory/settings.js";
export { OpenAICompatProvider } from "./llm/openai-compat.js";
export { createCompletionClient, createProvider } from "./llm/provider-factory.js";
export { MalformedCompletionError } from "./llm/types.js";
export type { CompletionOutcome, CompletionProvider, CompletionRequest } from "./llm/types.js";
export { createFileLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { createProgram } from "./cli/program.js";
export type { ProgramDeps, ProgramIO } from "./cli/program.js";
