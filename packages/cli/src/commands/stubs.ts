/**
 * dnpeek stubs command - print C# stubs for a module's types
 */

import { flatMap, error, ok, type Result } from "@dnpeek/frontend";
import { createStubCompilationUnit, printCompilationUnit } from "@dnpeek/emitter";
import type { CommandError, CommandOutput, ResolvedConfig } from "../types.js";
import { failed } from "./common.js";
import { assembleFromPath } from "./references.js";

export const stubsCommand = (
  modulePath: string,
  config: ResolvedConfig,
  typeName?: string
): Result<CommandOutput, CommandError> => {
  return flatMap(assembleFromPath(modulePath, config), (closure): Result<CommandOutput, CommandError> => {
    const stubs = createStubCompilationUnit(closure, { typeName });
    if (!stubs) {
      return error(failed(`Type not found: ${typeName ?? ""}`));
    }

    const text = printCompilationUnit(stubs.unit);
    return ok({
      lines: text.endsWith("\n") ? text.slice(0, -1).split("\n") : text.split("\n"),
      diagnostics: [...closure.diagnostics, ...stubs.diagnostics],
    });
  });
};
