#!/usr/bin/env node
/**
 * dnpeek CLI - inspect .NET modules and print decompiled stubs
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });

// Export for testing
export { runCli, EXIT_CODES } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
