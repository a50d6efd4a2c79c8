/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { map, ok, type Result } from "@dnpeek/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { frameworkCommand } from "../commands/framework.js";
import { resolveCommand } from "../commands/resolve.js";
import { referencesCommand } from "../commands/references.js";
import { stubsCommand } from "../commands/stubs.js";
import { formatDiagnostics } from "../commands/common.js";
import type { CommandError, CommandOutput, DnpeekConfig, ResolvedConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  unreadable: 3,
} as const;

/** Positional arguments each command requires */
const COMMAND_ARITY: Readonly<Record<string, readonly string[]>> = {
  framework: ["<module>"],
  resolve: ["<module>", "<reference>"],
  references: ["<module>"],
  stubs: ["<module>"],
};

const usageError = (message: string, usage?: string): number => {
  console.error(`Error: ${message}`);
  if (usage) {
    console.error(`Usage: ${usage}`);
  }
  return EXIT_CODES.usage;
};

type LoadedConfig = {
  readonly config: DnpeekConfig;
  readonly directory?: string;
};

const loadConfigFor = (parsed: ParsedArgs): Result<LoadedConfig, string> => {
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());
  if (!configPath) {
    return ok({ config: {} });
  }
  return map(loadConfig(configPath), (config) => ({ config, directory: dirname(configPath) }));
};

const runCommand = (
  command: string,
  positionals: readonly string[],
  config: ResolvedConfig,
  typeName: string | undefined
): Result<CommandOutput, CommandError> => {
  const [modulePath = "", second = ""] = positionals;
  switch (command) {
    case "framework":
      return frameworkCommand(modulePath);
    case "resolve":
      return resolveCommand(modulePath, second, config);
    case "references":
      return referencesCommand(modulePath, config);
    default:
      return stubsCommand(modulePath, config, typeName);
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (args: readonly string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`dnpeek v${VERSION}`);
    return EXIT_CODES.success;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.success;
  }

  const [unknownOption] = parsed.unknownOptions;
  if (unknownOption) {
    return usageError(`Unknown option: ${unknownOption}`);
  }

  const arity = COMMAND_ARITY[parsed.command];
  if (!arity) {
    return usageError(`Unknown command: ${parsed.command}`, "dnpeek --help");
  }
  if (parsed.positionals.length < arity.length) {
    return usageError(
      `Missing argument for ${parsed.command}`,
      `dnpeek ${parsed.command} ${arity.join(" ")}`
    );
  }

  const loaded = loadConfigFor(parsed);
  if (!loaded.ok) {
    console.error(`Error: ${loaded.error}`);
    return EXIT_CODES.error;
  }
  const config = resolveConfig(loaded.value.config, parsed.options, loaded.value.directory);

  if (config.verbose) {
    console.log(`[Cli] ${parsed.command} ${parsed.positionals.join(" ")}`);
  }

  const result = runCommand(parsed.command, parsed.positionals, config, parsed.options.type);
  const diagnostics = result.ok ? result.value.diagnostics : (result.error.diagnostics ?? []);
  const shown = config.quiet
    ? diagnostics.filter((diagnostic) => diagnostic.severity === "error")
    : diagnostics;
  for (const line of formatDiagnostics(shown)) {
    console.error(line);
  }

  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return result.error.kind === "unreadable" ? EXIT_CODES.unreadable : EXIT_CODES.error;
  }

  for (const line of result.value.lines) {
    console.log(line);
  }
  return EXIT_CODES.success;
};
