/**
 * Runtime personality - the .NET installation the resolver emulates
 *
 * Probing strategies depend on which runtime "hosts" the decompiler (where
 * its core library lives, whether a GAC exists, where dotnet is installed).
 * The personality captures all of that as a plain value so a resolver can be
 * pointed at any layout, including one laid out in a temporary directory.
 */

import * as os from "node:os";
import * as path from "node:path";
import type { Version } from "../types/metadata.js";
import { compareVersions, createVersion, parseVersion } from "../metadata/version.js";
import { isDirectory, listDirectories } from "./probe.js";

export type RuntimeFlavor = "netFramework" | "netCoreApp" | "mono";

export type RuntimePersonality = {
  readonly flavor: RuntimeFlavor;
  readonly platform: NodeJS.Platform;
  /** Directory holding the hosting runtime's core library */
  readonly baseLibraryDirectory?: string;
  readonly corlibVersion?: Version;
  readonly windowsDirectory?: string;
  readonly programFiles?: string;
  readonly programFilesX86?: string;
  readonly systemDirectory?: string;
  readonly is64BitOperatingSystem: boolean;
  readonly dotnetRoot?: string;
  readonly nugetPackagesDirectory?: string;
  /** Raw MONO_GAC_PREFIX value (platform path-delimiter separated) */
  readonly monoGacPrefix?: string;
};

export type DetectOptions = {
  readonly env?: NodeJS.ProcessEnv;
  readonly platform?: NodeJS.Platform;
  readonly arch?: string;
  readonly homeDirectory?: string;
};

const SIXTY_FOUR_BIT_ARCHES = new Set(["x64", "arm64", "ppc64", "s390x", "riscv64", "loong64"]);

const firstExisting = (candidates: readonly string[]): string | undefined =>
  candidates.find(isDirectory);

const dotnetRootCandidates = (
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  home: string
): readonly string[] => {
  if (platform === "win32") {
    return env.ProgramFiles ? [path.join(env.ProgramFiles, "dotnet")] : [];
  }
  if (platform === "darwin") {
    return ["/usr/local/share/dotnet", path.join(home, ".dotnet")];
  }
  return ["/usr/share/dotnet", "/usr/lib/dotnet", path.join(home, ".dotnet")];
};

const monoLibraryCandidates = (
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv
): readonly string[] => {
  const prefixes =
    platform === "darwin"
      ? ["/Library/Frameworks/Mono.framework/Versions/Current"]
      : platform === "win32"
        ? env.ProgramFiles
          ? [path.join(env.ProgramFiles, "Mono")]
          : []
        : ["/usr", "/usr/local"];
  return prefixes.map((prefix) => path.join(prefix, "lib", "mono", "4.5"));
};

/**
 * Directory of the newest shared framework under a dotnet root.
 */
export const findSharedRuntimeDirectory = (
  dotnetRoot: string,
  runtimePack = "Microsoft.NETCore.App"
): { readonly directory: string; readonly version: Version } | undefined => {
  const base = path.join(dotnetRoot, "shared", runtimePack);
  let best: { directory: string; version: Version } | undefined;
  for (const entry of listDirectories(base)) {
    const version = parseVersion(entry);
    if (!version) continue;
    if (!best || compareVersions(version, best.version) > 0) {
      best = { directory: path.join(base, entry), version };
    }
  }
  return best;
};

/**
 * Detect the personality of the runtime installed on this machine.
 *
 * Preference order: a dotnet shared runtime, then a Mono installation, then
 * the .NET Framework directory on Windows. Without any of those, Windows
 * hosts are treated as .NET Framework and everything else as Mono.
 */
export const detectRuntimePersonality = (
  options: DetectOptions = {}
): RuntimePersonality => {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const arch = options.arch ?? process.arch;
  const home = options.homeDirectory ?? os.homedir();

  const windowsDirectory =
    platform === "win32" ? (env.windir ?? env.SystemRoot) : undefined;
  const programFiles = platform === "win32" ? env.ProgramFiles : undefined;
  const programFilesX86 =
    platform === "win32" ? (env["ProgramFiles(x86)"] ?? programFiles) : undefined;
  const systemDirectory = windowsDirectory
    ? path.join(windowsDirectory, "System32")
    : undefined;
  const is64BitOperatingSystem =
    SIXTY_FOUR_BIT_ARCHES.has(arch) ||
    (platform === "win32" && env.PROCESSOR_ARCHITEW6432 !== undefined);

  const dotnetRoot =
    env.DOTNET_ROOT ?? firstExisting(dotnetRootCandidates(platform, env, home));
  const nugetPackagesDirectory =
    env.NUGET_PACKAGES ?? path.join(home, ".nuget", "packages");

  const common = {
    platform,
    windowsDirectory,
    programFiles,
    programFilesX86,
    systemDirectory,
    is64BitOperatingSystem,
    dotnetRoot,
    nugetPackagesDirectory,
    monoGacPrefix: env.MONO_GAC_PREFIX,
  };

  const shared = dotnetRoot ? findSharedRuntimeDirectory(dotnetRoot) : undefined;
  if (shared) {
    return {
      ...common,
      flavor: "netCoreApp",
      baseLibraryDirectory: shared.directory,
      corlibVersion: createVersion(shared.version.major, shared.version.minor, 0, 0),
    };
  }

  const monoLibrary = firstExisting(monoLibraryCandidates(platform, env));
  if (monoLibrary) {
    return {
      ...common,
      flavor: "mono",
      baseLibraryDirectory: monoLibrary,
      corlibVersion: createVersion(4, 0, 0, 0),
    };
  }

  if (platform === "win32") {
    const framework = windowsDirectory
      ? firstExisting([
          path.join(windowsDirectory, "Microsoft.NET", is64BitOperatingSystem ? "Framework64" : "Framework", "v4.0.30319"),
        ])
      : undefined;
    return {
      ...common,
      flavor: "netFramework",
      baseLibraryDirectory: framework,
      corlibVersion: framework ? createVersion(4, 0, 0, 0) : undefined,
    };
  }

  return { ...common, flavor: "mono" };
};
