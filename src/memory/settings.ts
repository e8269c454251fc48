import { z } from "zod";

export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

export const SettingsSchema = z.object({
  model: z.string().default("gemini-2.5-pro"),
  apiKey: z.string().optional(),
  baseUrl: z.string().default(DEFAULT_BASE_URL),
  logDir: z.string().default("logs"),
  cachePath: z.string().default("llm_cache.json"),
  debug: z.boolean().default(false),
});

export type Settings = z.infer<typeof SettingsSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Read settings from the environment. The API key is passed through as-is;
 * a missing key only shows up once the remote API rejects the request.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return SettingsSchema.parse({
    model: nonEmpty(env.LLM_MODEL),
    apiKey: nonEmpty(env.LLM_API_KEY),
    baseUrl: nonEmpty(env.LLM_BASE_URL),
    logDir: nonEmpty(env.LOG_DIR),
    cachePath: nonEmpty(env.LLM_CACHE_FILE),
    debug: env.PROMPTCACHE_DEBUG === "1",
  });
}
