/**
 * Reference resolver - map symbolic module references to files on disk
 *
 * Emulates the probing a real runtime would do for the main module's target
 * framework: user search directories, the hosting runtime's framework
 * directories, the core library layout, the GAC, and for .NET Core family
 * targets the dotnet packs/shared layout and NuGet packages.
 */

import * as path from "node:path";
import type { ModuleReference } from "../types/metadata.js";
import { error, ok, type Result } from "../types/result.js";
import { referenceFullName, isSpecialVersionOrRetargetable } from "../metadata/module-reference.js";
import { jsonModuleReader, type ModuleReader } from "../metadata/loader.js";
import {
  hasSpecificVersion,
  parseTargetFramework,
  unknownTargetFramework,
  type TargetFrameworkIdentity,
} from "../framework/target-framework.js";
import { detectRuntimePersonality, type RuntimePersonality } from "./runtime-personality.js";
import {
  createDotNetCorePathFinder,
  type ModernRuntimePathFinder,
  type ModernRuntimePathFinderFactory,
} from "./dotnet-core-path-finder.js";
import { findCorlib } from "./corlib.js";
import { findInGac, gacRoots } from "./gac.js";
import { findWindowsMetadataFile, resolveSilverlight } from "./platform-metadata.js";
import { searchDirectories } from "./probe.js";
import {
  found,
  notFound,
  type ResolvedModule,
  type ResolveError,
  type ResolveOutcome,
} from "./types.js";

export const DEFAULT_RUNTIME_PACK = "Microsoft.NETCore.App";

export type ReferenceResolverOptions = {
  /** Path of the module whose references are being resolved */
  readonly mainModulePath?: string;
  /** Identity or moniker text; defaults to the unknown framework */
  readonly targetFramework?: TargetFrameworkIdentity | string;
  readonly runtimePack?: string;
  /** Report not-found and unreadable modules as errors */
  readonly strict?: boolean;
  readonly personality?: RuntimePersonality;
  readonly moduleReader?: ModuleReader;
  readonly createModernRuntimePathFinder?: ModernRuntimePathFinderFactory;
  /** Used when no main module path is given */
  readonly workingDirectory?: string;
  readonly verbose?: boolean;
};

type Strategy = (reference: ModuleReference) => ResolveOutcome;

const fromPath = (file: string | undefined): ResolveOutcome =>
  file ? found(file) : notFound;

export class ReferenceResolver {
  readonly targetFramework: TargetFrameworkIdentity;
  readonly runtimePack: string;
  readonly strict: boolean;
  readonly personality: RuntimePersonality;
  readonly baseDirectory: string;

  private readonly mainModulePath: string | undefined;
  private readonly moduleReader: ModuleReader;
  private readonly createModernRuntimePathFinder: ModernRuntimePathFinderFactory;
  private readonly verbose: boolean;
  private readonly directories: string[] = [];
  private readonly strategies: readonly Strategy[];
  private readonly gacRoots: readonly string[];

  // Created on first use; directories added before then are replayed into it
  private modernPathFinder: ModernRuntimePathFinder | undefined;

  constructor(options: ReferenceResolverOptions = {}) {
    this.targetFramework =
      typeof options.targetFramework === "string"
        ? parseTargetFramework(options.targetFramework)
        : (options.targetFramework ?? unknownTargetFramework);
    this.runtimePack = options.runtimePack ?? DEFAULT_RUNTIME_PACK;
    this.strict = options.strict ?? false;
    this.personality = options.personality ?? detectRuntimePersonality();
    this.mainModulePath = options.mainModulePath;
    this.moduleReader = options.moduleReader ?? jsonModuleReader;
    this.createModernRuntimePathFinder =
      options.createModernRuntimePathFinder ?? createDotNetCorePathFinder;
    this.verbose = options.verbose ?? false;
    this.gacRoots = gacRoots(this.personality);
    this.strategies = this.selectStrategies();

    const mainDirectory = options.mainModulePath
      ? path.dirname(options.mainModulePath)
      : "";
    this.baseDirectory =
      mainDirectory.trim().length > 0
        ? mainDirectory
        : (options.workingDirectory ?? process.cwd());
    this.addSearchDirectory(this.baseDirectory);
  }

  addSearchDirectory(directory: string): void {
    this.directories.push(directory);
    this.modernPathFinder?.addSearchDirectory(directory);
  }

  removeSearchDirectory(directory: string): void {
    const index = this.directories.indexOf(directory);
    if (index >= 0) this.directories.splice(index, 1);
    this.modernPathFinder?.removeSearchDirectory(directory);
  }

  getSearchDirectories(): readonly string[] {
    return [...this.directories];
  }

  /**
   * Locate the file for a reference without loading it.
   */
  locate(reference: ModuleReference): ResolveOutcome {
    if (reference.isWindowsRuntime) {
      return fromPath(findWindowsMetadataFile(reference, this.personality));
    }

    for (const strategy of this.strategies) {
      const outcome = strategy(reference);
      if (outcome.kind !== "notFound") return outcome;
    }
    return notFound;
  }

  /** Non-throwing probe: the located path, or null */
  findFile(reference: ModuleReference): string | null {
    const outcome = this.locate(reference);
    return outcome.kind === "found" ? outcome.path : null;
  }

  /**
   * Locate and load a reference. Outside strict mode a missing or unreadable
   * module yields `null`; fatal lookups are errors in every mode.
   */
  resolve(reference: ModuleReference): Result<ResolvedModule | null, ResolveError> {
    const outcome = this.locate(reference);

    switch (outcome.kind) {
      case "fatal":
        return error(outcome.reason);

      case "notFound":
        if (this.verbose) {
          console.log(`[Resolver] Could not resolve ${referenceFullName(reference)}`);
        }
        return this.strict
          ? error({ kind: "moduleNotFound", reference })
          : ok(null);

      case "found": {
        const read = this.moduleReader.read(outcome.path);
        if (!read.ok) {
          if (this.verbose) {
            console.warn(`[Resolver] Failed to read ${outcome.path}: ${read.error[0]?.message ?? "unknown error"}`);
          }
          return this.strict
            ? error({ kind: "unreadableModule", path: outcome.path, diagnostics: read.error })
            : ok(null);
        }
        if (this.verbose) {
          console.log(`[Resolver] ${reference.name} -> ${outcome.path}`);
        }
        return ok({ filePath: outcome.path, metadata: read.value });
      }
    }
  }

  private selectStrategies(): readonly Strategy[] {
    const generic: Strategy = (reference) => this.resolveGeneric(reference);
    const specific = hasSpecificVersion(this.targetFramework);

    switch (this.targetFramework.family) {
      case "NET":
      case "NETCoreApp":
      case "NETStandard":
        return specific
          ? [(reference) => fromPath(this.getModernPathFinder().tryResolve(reference)), generic]
          : [generic];
      case "Silverlight":
        return specific
          ? [
              (reference) =>
                fromPath(resolveSilverlight(reference, this.targetFramework.version, this.personality)),
              generic,
            ]
          : [generic];
      case "NETFramework":
        return [generic];
    }
  }

  private getModernPathFinder(): ModernRuntimePathFinder {
    if (this.modernPathFinder) return this.modernPathFinder;

    const finder = this.createModernRuntimePathFinder({
      mainModulePath: this.mainModulePath,
      targetFramework: this.targetFramework,
      runtimePack: this.runtimePack,
      personality: this.personality,
      verbose: this.verbose,
    });
    for (const directory of this.directories) {
      finder.addSearchDirectory(directory);
    }
    this.modernPathFinder = finder;
    return finder;
  }

  private frameworkDirectories(): readonly string[] {
    const base = this.personality.baseLibraryDirectory;
    if (!base) return [];
    return this.personality.flavor === "mono" ? [base, path.join(base, "Facades")] : [base];
  }

  private resolveGeneric(reference: ModuleReference): ResolveOutcome {
    const inSearchDirectories = searchDirectories(reference, this.directories);
    if (inSearchDirectories) return found(inSearchDirectories);

    const frameworkDirectories = this.frameworkDirectories();
    if (isSpecialVersionOrRetargetable(reference)) {
      const file = searchDirectories(reference, frameworkDirectories);
      if (file) return found(file);
    }

    if (reference.name === "mscorlib") {
      const corlib = findCorlib(reference, this.personality, this.strict);
      if (corlib.kind !== "notFound") return corlib;
    }

    const inGac = findInGac(reference, this.personality, this.gacRoots);
    if (inGac) return found(inGac);

    // Last resort: framework directories regardless of version
    return fromPath(searchDirectories(reference, frameworkDirectories));
  }
}
