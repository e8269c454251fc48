// ─── Provider Interface ───

export interface CompletionRequest {
  model: string;
  prompt: string;
}

export interface CompletionProvider {
  name: string;
  complete(request: CompletionRequest): Promise<string>;
}

// ─── Cache Outcome ───

export type CompletionOutcome =
  | { kind: "hit"; text: string }
  | { kind: "miss-stored"; text: string }
  | { kind: "miss-store-failed"; text: string; error: Error }
  | { kind: "uncached"; text: string };

// ─── Errors ───

export class MalformedCompletionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedCompletionError";
  }
}
