import chalk from "chalk";
import { Command } from "commander";
import type { CompletionClient } from "../core/completion-client.js";
import { loadSettings } from "../memory/settings.js";
import type { Settings } from "../memory/settings.js";

export const VERSION = "0.1.0";

export interface ProgramIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface ProgramDeps {
  createClient: (settings: Settings) => CompletionClient;
  env?: NodeJS.ProcessEnv;
  io?: ProgramIO;
}

interface RunOptions {
  cache: boolean;
  model?: string;
  outcome?: boolean;
}

const processIO: ProgramIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function applyRuntimeOverrides(settings: Settings, options: RunOptions): Settings {
  return {
    ...settings,
    ...(options.model ? { model: options.model } : {}),
  };
}

export function createProgram(deps: ProgramDeps): Command {
  const io = deps.io ?? processIO;
  const program = new Command();

  program
    .name("promptcache")
    .description("Send a prompt to an LLM completion API, caching responses on disk")
    .version(VERSION)
    .option("-m, --model <model>", "Override LLM_MODEL")
    .option("--no-cache", "Skip the response cache for this call")
    .option("--outcome", "Print how the cache was used to stderr")
    .argument("<prompt...>", "Prompt text")
    .action(async (promptWords: string[], options: RunOptions) => {
      const settings = applyRuntimeOverrides(loadSettings(deps.env), options);
      const client = deps.createClient(settings);

      try {
        const outcome = await client.completeWithOutcome(promptWords.join(" "), options.cache);
        io.stdout(`${outcome.text}\n`);
        if (options.outcome) {
          io.stderr(`${outcome.kind}\n`);
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        io.stderr(`${chalk.red(`Error: ${message}`)}\n`);
        process.exitCode = 1;
      }
    });

  return program;
}
