/**
 * Open a main module and the resolver for its references
 */

import * as path from "node:path";
import { ok, type Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { jsonModuleReader } from "../metadata/loader.js";
import { identifyTargetFramework } from "../framework/identify.js";
import { isUnknownTargetFramework } from "../framework/target-framework.js";
import { ReferenceResolver, type ReferenceResolverOptions } from "./reference-resolver.js";
import type { ResolvedModule } from "./types.js";

export type MainModule = {
  readonly module: ResolvedModule;
  readonly resolver: ReferenceResolver;
  readonly diagnostics: readonly Diagnostic[];
};

export type LoadMainModuleOptions = Omit<
  ReferenceResolverOptions,
  "mainModulePath" | "targetFramework"
> & {
  /** Extra search directories, consulted after the module's own directory */
  readonly searchDirectories?: readonly string[];
};

/**
 * Read the main module, identify its target framework and construct a
 * resolver configured for it.
 */
export const loadMainModule = (
  filePath: string,
  options: LoadMainModuleOptions = {}
): Result<MainModule, Diagnostic[]> => {
  const absolutePath = path.resolve(filePath);
  const reader = options.moduleReader ?? jsonModuleReader;
  const read = reader.read(absolutePath);
  if (!read.ok) {
    return read;
  }

  const targetFramework = identifyTargetFramework(read.value, absolutePath);
  const diagnostics: Diagnostic[] = [];
  if (isUnknownTargetFramework(targetFramework)) {
    diagnostics.push({
      code: "DNP2001",
      severity: "info",
      message: `Target framework of ${read.value.name} could not be identified`,
      location: { file: absolutePath },
    });
  }

  const resolver = new ReferenceResolver({
    ...options,
    moduleReader: reader,
    mainModulePath: absolutePath,
    targetFramework,
  });
  for (const directory of options.searchDirectories ?? []) {
    resolver.addSearchDirectory(path.resolve(directory));
  }

  return ok({
    module: { filePath: absolutePath, metadata: read.value },
    resolver,
    diagnostics,
  });
};
