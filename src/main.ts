#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCompletionClient } from "./llm/provider-factory.js";

const program = createProgram({ createClient: (settings) => createCompletionClient(settings) });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
