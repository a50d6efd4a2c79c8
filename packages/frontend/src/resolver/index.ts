/**
 * Reference resolver - Public API
 */

export {
  ReferenceResolver,
  DEFAULT_RUNTIME_PACK,
  type ReferenceResolverOptions,
} from "./reference-resolver.js";
export { loadMainModule } from "./main-module.js";
export type { MainModule, LoadMainModuleOptions } from "./main-module.js";
export {
  DotNetCorePathFinder,
  createDotNetCorePathFinder,
  readDepsJsonLibraries,
  shortFrameworkName,
} from "./dotnet-core-path-finder.js";
export type {
  ModernRuntimePathFinder,
  ModernRuntimePathFinderFactory,
  ModernRuntimePathFinderOptions,
} from "./dotnet-core-path-finder.js";
export {
  detectRuntimePersonality,
  findSharedRuntimeDirectory,
} from "./runtime-personality.js";
export type {
  RuntimeFlavor,
  RuntimePersonality,
  DetectOptions,
} from "./runtime-personality.js";
export { findCorlib } from "./corlib.js";
export { findInGac, gacRoots, gacFilePath } from "./gac.js";
export { findWindowsMetadataFile, resolveSilverlight } from "./platform-metadata.js";
export {
  searchDirectory,
  searchDirectories,
  findClosestVersionDirectory,
} from "./probe.js";
export {
  found,
  notFound,
  resolveErrorToDiagnostic,
} from "./types.js";
export type {
  ResolvedModule,
  ResolveOutcome,
  ResolveError,
} from "./types.js";
