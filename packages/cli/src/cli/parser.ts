/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  /** Positional arguments after the command */
  readonly positionals: readonly string[];
  readonly options: CliOptions;
  /** Options the parser does not know */
  readonly unknownOptions: readonly string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];
  const unknownOptions: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {}, unknownOptions: [] };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {}, unknownOptions: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--runtime-pack":
        options.runtimePack = args[++i] ?? "";
        break;
      case "-t":
      case "--type":
        options.type = args[++i] ?? "";
        break;
      case "-L":
      case "--lib":
        {
          const libPath = args[++i] ?? "";
          if (libPath) {
            options.lib = options.lib || [];
            options.lib.push(libPath);
          }
        }
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, positionals, options, unknownOptions };
};
