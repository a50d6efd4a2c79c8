/**
 * dnpeek references command - list the assembled type system
 */

import {
  assembleTypeSystem,
  formatVersion,
  map,
  type Result,
  type TypeSystemClosure,
} from "@dnpeek/frontend";
import type { CommandError, CommandOutput, ResolvedConfig } from "../types.js";
import { openMainModule } from "./common.js";

/**
 * Open a module and assemble its type system with the configured options
 */
export const assembleFromPath = (
  modulePath: string,
  config: ResolvedConfig
): Result<TypeSystemClosure, CommandError> => {
  return map(openMainModule(modulePath, config), ({ module, resolver, diagnostics }) => {
    const closure = assembleTypeSystem(module, resolver, config.typeSystemOptions, {
      verbose: config.verbose,
    });
    return { ...closure, diagnostics: [...diagnostics, ...closure.diagnostics] };
  });
};

export const referencesCommand = (
  modulePath: string,
  config: ResolvedConfig
): Result<CommandOutput, CommandError> => {
  return map(assembleFromPath(modulePath, config), (closure) => ({
    lines: closure.modules.map((module) => {
      const location = module.isSynthetic ? "(synthetic)" : (module.filePath ?? "");
      return `${module.name} ${formatVersion(module.metadata.version)} ${location}`;
    }),
    diagnostics: closure.diagnostics,
  }));
};
