#!/usr/bin/env node

import { OrchestratorError } from "./errors.js";
import { buildProgram } from "./program.js";

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = err instanceof OrchestratorError ? 2 : 1;
  }
}

void main();
