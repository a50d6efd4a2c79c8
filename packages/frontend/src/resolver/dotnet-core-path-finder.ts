/**
 * Resolution for .NET Core, .NET 5+ and .NET Standard targets
 *
 * Probe order: user search directories, NuGet packages listed in the main
 * module's `.deps.json`, the runtime pack's reference assemblies
 * (`<dotnet>/packs/<pack>.Ref/<version>/ref/net<major.minor>/`) and finally the
 * shared runtime (`<dotnet>/shared/<pack>/<version>/`).
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ModuleReference } from "../types/metadata.js";
import type { TargetFrameworkIdentity } from "../framework/target-framework.js";
import type { RuntimePersonality } from "./runtime-personality.js";
import {
  findClosestVersionDirectory,
  isDirectory,
  listDirectories,
  searchDirectories,
  searchDirectory,
} from "./probe.js";

/**
 * Strategy used for modern (.NET Core family) targets. Constructed lazily by
 * the reference resolver the first time such a reference is resolved.
 */
export type ModernRuntimePathFinder = {
  tryResolve(reference: ModuleReference): string | undefined;
  addSearchDirectory(directory: string): void;
  removeSearchDirectory(directory: string): void;
};

export type ModernRuntimePathFinderOptions = {
  readonly mainModulePath?: string;
  readonly targetFramework: TargetFrameworkIdentity;
  readonly runtimePack: string;
  readonly personality: RuntimePersonality;
  readonly verbose?: boolean;
};

export type ModernRuntimePathFinderFactory = (
  options: ModernRuntimePathFinderOptions
) => ModernRuntimePathFinder;

/** NuGet short folder name of a target framework ("net8.0", "netstandard2.0") */
export const shortFrameworkName = (identity: TargetFrameworkIdentity): string => {
  const version = `${identity.version.major}.${identity.version.minor}`;
  switch (identity.family) {
    case "NET":
      return `net${version}`;
    case "NETCoreApp":
      return `netcoreapp${version}`;
    case "NETStandard":
      return `netstandard${version}`;
    case "Silverlight":
      return `sl${identity.version.major}`;
    case "NETFramework":
      return `net${identity.version.major}${identity.version.minor}`;
  }
};

type DepsJsonLibrary = {
  readonly name: string;
  readonly version: string;
  readonly path: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Package libraries of a `.deps.json` file. Project and reference entries
 * carry no package path and are skipped.
 */
export const readDepsJsonLibraries = (
  depsJsonPath: string
): readonly DepsJsonLibrary[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(depsJsonPath, "utf-8"));
  } catch {
    return [];
  }
  if (!isRecord(parsed) || !isRecord(parsed.libraries)) return [];

  const libraries: DepsJsonLibrary[] = [];
  for (const [key, value] of Object.entries(parsed.libraries)) {
    if (!isRecord(value) || value.type !== "package") continue;
    const separator = key.lastIndexOf("/");
    if (separator <= 0) continue;
    const name = key.slice(0, separator);
    const version = key.slice(separator + 1);
    const packagePath =
      typeof value.path === "string"
        ? value.path
        : `${name.toLowerCase()}/${version.toLowerCase()}`;
    libraries.push({ name, version, path: packagePath });
  }
  return libraries;
};

const depsJsonPathFor = (mainModulePath: string): string =>
  path.join(
    path.dirname(mainModulePath),
    `${path.basename(mainModulePath, path.extname(mainModulePath))}.deps.json`
  );

export class DotNetCorePathFinder implements ModernRuntimePathFinder {
  private readonly searchDirectories: string[] = [];
  private readonly packageDirectories: readonly string[];
  private readonly referencePackDirectory: string | undefined;
  private readonly sharedRuntimeDirectory: string | undefined;
  private readonly verbose: boolean;

  constructor(options: ModernRuntimePathFinderOptions) {
    this.verbose = options.verbose ?? false;
    this.packageDirectories = options.mainModulePath
      ? this.findPackageDirectories(options.mainModulePath, options)
      : [];

    const dotnetRoot = options.personality.dotnetRoot;
    const version = options.targetFramework.version;
    if (dotnetRoot) {
      const packBase = path.join(dotnetRoot, "packs", `${options.runtimePack}.Ref`);
      const packVersion = isDirectory(packBase)
        ? findClosestVersionDirectory(packBase, version)
        : undefined;
      this.referencePackDirectory = packVersion
        ? path.join(packBase, packVersion, "ref", `net${version.major}.${version.minor}`)
        : undefined;

      const sharedBase = path.join(dotnetRoot, "shared", options.runtimePack);
      this.sharedRuntimeDirectory = isDirectory(sharedBase)
        ? path.join(sharedBase, findClosestVersionDirectory(sharedBase, version))
        : undefined;
    }

    if (this.verbose) {
      console.log(
        `[Resolver] .NET Core path finder: ${this.packageDirectories.length} package directories, ` +
          `ref pack ${this.referencePackDirectory ?? "(none)"}, shared runtime ${this.sharedRuntimeDirectory ?? "(none)"}`
      );
    }
  }

  addSearchDirectory(directory: string): void {
    this.searchDirectories.push(directory);
  }

  removeSearchDirectory(directory: string): void {
    const index = this.searchDirectories.indexOf(directory);
    if (index >= 0) this.searchDirectories.splice(index, 1);
  }

  tryResolve(reference: ModuleReference): string | undefined {
    const fromSearch = searchDirectories(reference, this.searchDirectories);
    if (fromSearch) return fromSearch;

    const fromPackages = searchDirectories(reference, this.packageDirectories);
    if (fromPackages) return fromPackages;

    for (const directory of [this.referencePackDirectory, this.sharedRuntimeDirectory]) {
      if (!directory) continue;
      const file = searchDirectory(reference, directory);
      if (file) return file;
    }
    return undefined;
  }

  private findPackageDirectories(
    mainModulePath: string,
    options: ModernRuntimePathFinderOptions
  ): readonly string[] {
    const packagesRoot = options.personality.nugetPackagesDirectory;
    if (!packagesRoot) return [];

    const preferred = shortFrameworkName(options.targetFramework);
    const directories: string[] = [];
    for (const library of readDepsJsonLibraries(depsJsonPathFor(mainModulePath))) {
      const libRoot = path.join(packagesRoot, library.path, "lib");
      // Exact framework folder first, then the rest newest-name first
      const folders = [...listDirectories(libRoot)].sort((a, b) =>
        a === preferred ? -1 : b === preferred ? 1 : b.localeCompare(a)
      );
      for (const folder of folders) {
        directories.push(path.join(libRoot, folder));
      }
    }
    return directories;
  }
}

export const createDotNetCorePathFinder: ModernRuntimePathFinderFactory = (
  options
) => new DotNetCorePathFinder(options);
