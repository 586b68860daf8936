#!/usr/bin/env node

import { enableLogging } from "@clusterboot/backend/logger";
import { emitError } from "./core/cli-output";
import { globalsFrom } from "./core/context";
import { buildProgram } from "./program";

// before anything logs
if (process.argv.includes("--verbose")) {
  enableLogging();
}

const program = buildProgram({ env: process.env, bootstrap: {} });

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    emitError({ globals: globalsFrom(program) }, "clusterboot", error);
    process.exitCode = 1;
  }
}

void main();
