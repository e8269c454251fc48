import type { Settings } from "../memory/settings.js";
import { ResponseCache } from "../memory/response-cache.js";
import { CompletionClient } from "../core/completion-client.js";
import { createFileLogger } from "../utils/logger.js";
import { OpenAICompatProvider } from "./openai-compat.js";
import type { CompletionProvider } from "./types.js";

/**
 * Create the completion provider for the configured endpoint
 */
export function createProvider(settings: Settings): CompletionProvider {
  return new OpenAICompatProvider(settings.baseUrl, settings.apiKey);
}

/**
 * Build a client that owns its own cache file and log directory.
 */
export function createCompletionClient(settings: Settings, provider?: CompletionProvider): CompletionClient {
  const logger = createFileLogger({ logDir: settings.logDir, debug: settings.debug });

  return new CompletionClient({
    provider: provider ?? createProvider(settings),
    cache: new ResponseCache(settings.cachePath, logger),
    logger,
    model: settings.model,
  });
}
