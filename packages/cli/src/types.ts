/**
 * Type definitions for CLI
 */

import type { DecompilerSettings } from "@dnpeek/emitter";
import type { Diagnostic, TypeSystemOptions } from "@dnpeek/frontend";

export type TypeSystemConfig = {
  readonly dynamic?: boolean;
  readonly tupleTypes?: boolean;
  readonly extensionMethods?: boolean;
  readonly decimalConstants?: boolean;
  readonly onlyPublicApi?: boolean;
  readonly uncached?: boolean;
};

export type DecompilerConfig = {
  readonly decompileMemberBodies?: boolean;
  readonly useDebugSymbols?: boolean;
};

/**
 * dnpeek configuration file (dnpeek.json)
 */
export type DnpeekConfig = {
  readonly $schema?: string;
  /** Probed before any platform lookup, relative to the config file */
  readonly searchDirectories?: readonly string[];
  readonly strict?: boolean;
  readonly runtimePack?: string;
  readonly typeSystem?: TypeSystemConfig;
  readonly decompiler?: DecompilerConfig;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  lib?: string[]; // Extra search directories
  strict?: boolean;
  runtimePack?: string;
  type?: string; // stubs: single type full name
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly searchDirectories: readonly string[];
  readonly strict: boolean;
  readonly runtimePack: string;
  readonly typeSystemOptions: TypeSystemOptions;
  readonly decompilerSettings: DecompilerSettings;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Failure of a command. `unreadable` means the input module itself could
 * not be read.
 */
export type CommandError = {
  readonly kind: "failed" | "unreadable";
  readonly message: string;
  readonly diagnostics?: readonly Diagnostic[];
};

/** What a command prints: result lines on stdout, diagnostics on stderr */
export type CommandOutput = {
  readonly lines: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
};
