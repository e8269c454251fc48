import type { ResponseCache } from "../memory/response-cache.js";
import type { Logger } from "../utils/logger.js";
import type { CompletionOutcome, CompletionProvider } from "../llm/types.js";

export interface CompletionClientOptions {
  provider: CompletionProvider;
  cache: ResponseCache;
  logger: Logger;
  model: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends one prompt per call to the configured provider, with an optional
 * prompt-keyed response cache and a log line for every prompt and response.
 */
export class CompletionClient {
  private readonly provider: CompletionProvider;
  private readonly cache: ResponseCache;
  private readonly logger: Logger;
  readonly model: string;

  constructor(options: CompletionClientOptions) {
    this.provider = options.provider;
    this.cache = options.cache;
    this.logger = options.logger;
    this.model = options.model;
  }

  async complete(prompt: string, useCache = true): Promise<string> {
    const outcome = await this.completeWithOutcome(prompt, useCache);
    return outcome.text;
  }

  /**
   * Same as {@link complete}, but reports how the cache was involved.
   * Provider errors are logged and rethrown unchanged; cache write failures
   * are logged and reported as `miss-store-failed`.
   */
  async completeWithOutcome(prompt: string, useCache = true): Promise<CompletionOutcome> {
    this.logger.info(`PROMPT: ${prompt}`);

    if (useCache) {
      const cached = this.cache.lookup(prompt);
      if (cached !== undefined) {
        this.logger.info(`RESPONSE: ${cached}`);
        return { kind: "hit", text: cached };
      }
    }

    this.logger.debug(`Calling ${this.provider.name} with model ${this.model}`);
    let text: string;
    try {
      text = await this.provider.complete({ model: this.model, prompt });
    } catch (error: unknown) {
      this.logger.error(`LLM call failed: ${errorMessage(error)}`);
      throw error;
    }

    this.logger.info(`RESPONSE: ${text}`);

    if (!useCache) {
      return { kind: "uncached", text };
    }

    const stored = this.cache.store(prompt, text);
    if (!stored.ok) {
      return { kind: "miss-store-failed", text, error: stored.error };
    }
    return { kind: "miss-stored", text };
  }
}
