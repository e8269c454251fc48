import OpenAI from "openai";
import { MalformedCompletionError } from "./types.js";
import type { CompletionProvider, CompletionRequest } from "./types.js";

/**
 * Single-message chat completions against any OpenAI-compatible endpoint.
 * The SDK's own retries are turned off: one request per call.
 */
export class OpenAICompatProvider implements CompletionProvider {
  name = "openai-compat";
  private readonly client: OpenAI;

  constructor(baseURL: string, apiKey?: string, client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        baseURL,
        apiKey: apiKey || "not-required",
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: [{ role: "user", content: request.prompt }],
    });

    const content = response.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new MalformedCompletionError(`Completion from ${request.model} has no text content`);
    }
    return content;
  }
}
