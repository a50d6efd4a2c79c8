/**
 * Framework identification - work out which framework a module was built for
 *
 * Evidence is tried in order of reliability: the declared framework
 * attribute, the module's own name, its core-library references and finally
 * the directory it was loaded from.
 */

import type { ModuleMetadata } from "../types/metadata.js";
import { compareVersions, createVersion, formatVersion } from "../metadata/version.js";
import { hasPublicKeyToken } from "../metadata/module-reference.js";
import {
  parseTargetFramework,
  unknownTargetFramework,
  type TargetFrameworkIdentity,
} from "./target-framework.js";

const TARGET_FRAMEWORK_ATTRIBUTE = "System.Runtime.Versioning.TargetFrameworkAttribute";

/**
 * Directory shapes that betray a framework: reference assemblies, the GAC,
 * the framework install directory, the SDK's NuGet fallback folder, shared
 * runtimes and targeting packs.
 */
const PATH_SHAPES: readonly RegExp[] = [
  /Reference Assemblies[/\\]Microsoft[/\\]Framework[/\\](?<type>\.NETFramework)[/\\]v(?<version>[^/\\]+)[/\\]/i,
  /(?<type>Microsoft\.NET)[/\\]assembly[/\\]GAC_(?:MSIL|32|64)[/\\]/i,
  /(?<type>Microsoft\.NET)[/\\]Framework(?:64)?[/\\](?<version>[^/\\]+)[/\\]/i,
  /NuGetFallbackFolder[/\\](?<type>[^/\\]+)[/\\](?<version>[^/\\]+)(?:[/\\].*)?[/\\]ref[/\\]/i,
  /shared[/\\](?<type>[^/\\]+)[/\\](?<version>[^/\\]+)(?:[/\\].*)?[/\\]/i,
  /packs[/\\](?<type>[^/\\]+)[/\\](?<version>[^/\\]+)[/\\]ref(?:[/\\].*)?[/\\]/i,
];

type PathEvidence = {
  readonly type: string;
  readonly version?: string;
};

/** Leftmost match across all shapes; ties go to the earlier shape */
const matchPathShape = (filePath: string): PathEvidence | undefined => {
  let best: { index: number; evidence: PathEvidence } | undefined;
  for (const shape of PATH_SHAPES) {
    const match = shape.exec(filePath);
    if (!match || (best && match.index >= best.index)) continue;
    best = {
      index: match.index,
      evidence: {
        type: match.groups?.type ?? "",
        version: match.groups?.version,
      },
    };
  }
  return best?.evidence;
};

const trimRuntimeVersion = (version: string): string => version.replace(/^v+/, "");

const fromDeclaredAttribute = (module: ModuleMetadata): string | undefined => {
  if (module.targetFramework) return module.targetFramework;
  for (const type of module.types) {
    // Attribute may also be captured on the module's <Module> pseudo type
    if (type.name !== "<Module>") continue;
    const attribute = type.attributes.find((a) => a.type === TARGET_FRAMEWORK_ATTRIBUTE);
    const value = attribute?.arguments?.[0];
    if (typeof value === "string") return value;
  }
  return undefined;
};

const fromModuleName = (module: ModuleMetadata): string | undefined => {
  switch (module.name) {
    case "mscorlib":
      return `.NETFramework,Version=v${formatVersion(module.version, 2)}`;
    case "netstandard":
      return `.NETStandard,Version=v${formatVersion(module.version, 2)}`;
    default:
      return undefined;
  }
};

const fromReferences = (module: ModuleMetadata): string | undefined => {
  for (const reference of module.references) {
    if (!hasPublicKeyToken(reference)) continue;

    switch (reference.name) {
      case "netstandard":
        return `.NETStandard,Version=v${formatVersion(reference.version, 2)}`;
      case "System.Runtime": {
        // System.Runtime 4.2.0 shipped with .NET Core 2.0, 4.2.1 with 3.0, 4.2.2 with 3.1
        const version = reference.version;
        if (compareVersions(version, createVersion(4, 2, 0)) < 0) continue;
        let core = "2.0";
        if (compareVersions(version, createVersion(4, 2, 1)) >= 0) core = "3.0";
        if (compareVersions(version, createVersion(4, 2, 2)) >= 0) core = "3.1";
        return `.NETCoreApp,Version=v${core}`;
      }
      case "mscorlib":
        return `.NETFramework,Version=v${formatVersion(reference.version, 2)}`;
    }
  }
  return undefined;
};

const fromFilePath = (module: ModuleMetadata, filePath: string): string => {
  const evidence = matchPathShape(filePath);
  if (!evidence) {
    const runtime = trimRuntimeVersion(module.runtimeVersion || "4.0");
    return `.NETFramework,Version=v${runtime.slice(0, 3)}`;
  }

  const version = evidence.version || module.runtimeVersion || "";
  const type = evidence.type.toLowerCase();
  if (type === "microsoft.net" || type === ".netframework") {
    return `.NETFramework,Version=v${trimRuntimeVersion(version).slice(0, 3)}`;
  }
  if (type.includes("netcore")) {
    return `.NETCoreApp,Version=v${version}`;
  }
  if (type.includes("netstandard")) {
    return `.NETStandard,Version=v${version}`;
  }
  return "";
};

/**
 * Moniker text for a module, or "" when nothing identifies it.
 */
export const detectTargetFrameworkMoniker = (
  module: ModuleMetadata,
  filePath?: string
): string =>
  fromDeclaredAttribute(module) ??
  fromModuleName(module) ??
  fromReferences(module) ??
  (filePath !== undefined ? fromFilePath(module, filePath) : "");

/**
 * Identify the target framework of a module. Never throws; modules with no
 * usable evidence get the unknown identity.
 */
export const identifyTargetFramework = (
  module: ModuleMetadata,
  filePath?: string
): TargetFrameworkIdentity => {
  const moniker = detectTargetFrameworkMoniker(module, filePath);
  return moniker.length > 0 ? parseTargetFramework(moniker) : unknownTargetFramework;
};
