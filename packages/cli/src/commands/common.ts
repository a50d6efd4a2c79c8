/**
 * Shared command plumbing: opening the main module
 */

import {
  formatDiagnostic,
  loadMainModule,
  type Diagnostic,
  type MainModule,
  error,
  type Result,
} from "@dnpeek/frontend";
import type { CommandError, ResolvedConfig } from "../types.js";

export const unreadable = (modulePath: string, diagnostics: readonly Diagnostic[]): CommandError => ({
  kind: "unreadable",
  message: `Could not read module ${modulePath}`,
  diagnostics,
});

export const failed = (message: string, diagnostics?: readonly Diagnostic[]): CommandError =>
  diagnostics ? { kind: "failed", message, diagnostics } : { kind: "failed", message };

/**
 * Read the main module and configure a resolver for it
 */
export const openMainModule = (
  modulePath: string,
  config: ResolvedConfig
): Result<MainModule, CommandError> => {
  const opened = loadMainModule(modulePath, {
    searchDirectories: config.searchDirectories,
    strict: config.strict,
    runtimePack: config.runtimePack,
    verbose: config.verbose,
  });
  return opened.ok ? opened : error(unreadable(modulePath, opened.error));
};

export const formatDiagnostics = (diagnostics: readonly Diagnostic[]): readonly string[] =>
  diagnostics.map(formatDiagnostic);
