import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";

// Entries are checked as pairs: z.record skips a "__proto__" key, which is a valid prompt.
const CacheObjectSchema = z.custom<Record<string, unknown>>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  "Cache file must hold a JSON object"
);
const CacheEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

export type StoreResult = { ok: true } | { ok: false; error: Error };

/**
 * Flat prompt -> completion store kept in a single JSON file.
 *
 * Best effort: reads fall back to an empty store and writes report failure
 * instead of throwing. There is no locking, so two processes writing at once
 * can drop each other's entries.
 */
export class ResponseCache {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  load(): Map<string, string> {
    if (!existsSync(this.filePath)) {
      return new Map();
    }

    try {
      const raw = JSON.parse(readFileSync(this.filePath, "utf8")) as unknown;
      const entries = CacheEntriesSchema.parse(Object.entries(CacheObjectSchema.parse(raw)));
      this.logger.debug(`Loaded ${entries.length} cache entries from ${this.filePath}`);
      return new Map(entries);
    } catch {
      this.logger.warn("Failed to load cache, starting with empty cache");
      return new Map();
    }
  }

  lookup(prompt: string): string | undefined {
    return this.load().get(prompt);
  }

  store(prompt: string, text: string): StoreResult {
    // Other writers may have added entries since the lookup.
    const entries = this.load();
    entries.set(prompt, text);

    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(entries)), "utf8");
      return { ok: true };
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Failed to save cache: ${error.message}`);
      return { ok: false, error };
    }
  }
}
