/**
 * Core library (mscorlib) location for .NET Framework, Compact Framework
 * and Mono layouts
 */

import * as path from "node:path";
import type { ModuleReference, Version } from "../types/metadata.js";
import { majorRevision, versionsEqual } from "../metadata/version.js";
import { isSpecialVersionOrRetargetable } from "../metadata/module-reference.js";
import type { RuntimePersonality } from "./runtime-personality.js";
import { found, notFound, type ResolveOutcome } from "./types.js";
import { isDirectory, isFile } from "./probe.js";

const COMPACT_FRAMEWORK_TOKEN = "969db8053d3322ac";

type BaseDirectory =
  | { readonly kind: "directory"; readonly path: string }
  | { readonly kind: "missing" }
  | { readonly kind: "unsupported" };

const missing: BaseDirectory = { kind: "missing" };
const unsupported: BaseDirectory = { kind: "unsupported" };

const frameworkFolderForVersion = (version: Version): string | undefined => {
  switch (version.major) {
    case 1:
      return majorRevision(version) === 3300 ? "v1.0.3705" : "v1.1.4322";
    case 2:
      return "v2.0.50727";
    case 4:
      return "v4.0.30319";
    default:
      return undefined;
  }
};

const windowsCorlibDirectory = (
  reference: ModuleReference,
  personality: RuntimePersonality
): BaseDirectory => {
  const version = reference.version;

  if (reference.publicKeyToken === COMPACT_FRAMEWORK_TOKEN) {
    const programFiles = personality.is64BitOperatingSystem
      ? personality.programFilesX86
      : personality.programFiles;
    if (!programFiles) return missing;
    const directory = path.join(
      programFiles,
      "Microsoft.NET",
      "SDK",
      "CompactFramework",
      `v${version.major}.${version.minor}`,
      "WindowsCE"
    );
    return isDirectory(directory) ? { kind: "directory", path: directory } : missing;
  }

  const folder = frameworkFolderForVersion(version);
  if (!folder) return unsupported;
  if (!personality.windowsDirectory) return missing;

  const root = path.join(personality.windowsDirectory, "Microsoft.NET");
  for (const framework of ["Framework", "Framework64"]) {
    const directory = path.join(root, framework, folder);
    if (isDirectory(directory)) return { kind: "directory", path: directory };
  }
  return missing;
};

const monoCorlibDirectory = (
  version: Version,
  personality: RuntimePersonality
): BaseDirectory => {
  let folder: string;
  switch (version.major) {
    case 1:
      folder = "1.0";
      break;
    case 2:
      folder = majorRevision(version) === 5 ? "2.1" : "2.0";
      break;
    case 4:
      folder = "4.0";
      break;
    default:
      return unsupported;
  }
  if (!personality.baseLibraryDirectory) return missing;
  return {
    kind: "directory",
    path: path.join(path.dirname(personality.baseLibraryDirectory), folder),
  };
};

/**
 * Locate `mscorlib.dll` for a reference. An unsupported version is fatal
 * in strict mode and simply not found otherwise.
 */
export const findCorlib = (
  reference: ModuleReference,
  personality: RuntimePersonality,
  strict: boolean
): ResolveOutcome => {
  if (personality.flavor !== "netCoreApp" && personality.baseLibraryDirectory) {
    const hostMatches =
      (personality.corlibVersion !== undefined &&
        versionsEqual(personality.corlibVersion, reference.version)) ||
      isSpecialVersionOrRetargetable(reference);
    const hostCorlib = path.join(personality.baseLibraryDirectory, "mscorlib.dll");
    if (hostMatches && isFile(hostCorlib)) {
      return found(hostCorlib);
    }
  }

  const base =
    personality.flavor === "mono"
      ? monoCorlibDirectory(reference.version, personality)
      : windowsCorlibDirectory(reference, personality);

  switch (base.kind) {
    case "unsupported":
      return strict
        ? { kind: "fatal", reason: { kind: "unsupportedRuntimeVersion", version: reference.version } }
        : notFound;
    case "missing":
      return notFound;
    case "directory": {
      const file = path.join(base.path, "mscorlib.dll");
      return isFile(file) ? found(file) : notFound;
    }
  }
};
