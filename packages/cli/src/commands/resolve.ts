/**
 * dnpeek resolve command - print the file a reference resolves to
 */

import {
  createModuleReference,
  referenceFullName,
  resolveErrorToDiagnostic,
  zeroVersion,
  type ModuleReference,
  error,
  ok,
  type Result,
} from "@dnpeek/frontend";
import type { CommandError, CommandOutput, ResolvedConfig } from "../types.js";
import { failed, openMainModule } from "./common.js";

/**
 * The main module's own reference of that name, or a version-agnostic one
 */
const referenceNamed = (
  references: readonly ModuleReference[],
  name: string
): ModuleReference =>
  references.find((reference) => reference.name.toLowerCase() === name.toLowerCase()) ??
  createModuleReference(name, zeroVersion);

export const resolveCommand = (
  modulePath: string,
  referenceName: string,
  config: ResolvedConfig
): Result<CommandOutput, CommandError> => {
  const opened = openMainModule(modulePath, config);
  if (!opened.ok) return opened;

  const { module, resolver, diagnostics } = opened.value;
  const reference = referenceNamed(module.metadata.references, referenceName);
  const outcome = resolver.locate(reference);

  switch (outcome.kind) {
    case "found":
      return ok({ lines: [outcome.path], diagnostics });
    case "notFound":
      return error(failed(`Could not resolve ${referenceFullName(reference)}`));
    case "fatal": {
      const diagnostic = resolveErrorToDiagnostic(outcome.reason);
      return error(failed(diagnostic.message, [diagnostic]));
    }
  }
};
