#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { errorMessage, exit } from "./shared/errors.js";
import { exitCodeFor } from "./cli/utils.js";

async function main() {
  if (process.env.GAMEWIRE_DEBUG_ARGS) {
    process.stderr.write(`[DEBUG ARGS] argv: ${JSON.stringify(process.argv)}\n`);
  }
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  exit(exitCodeFor(error), errorMessage(error));
});
