/**
 * Windows-only layouts: Windows Runtime metadata (.winmd) and Silverlight
 */

import * as path from "node:path";
import type { ModuleReference, Version } from "../types/metadata.js";
import type { RuntimePersonality } from "./runtime-personality.js";
import {
  findClosestVersionDirectory,
  isDirectory,
  isFile,
  listDirectories,
  searchDirectory,
} from "./probe.js";

const findInSystemWinMetadata = (
  reference: ModuleReference,
  personality: RuntimePersonality
): string | undefined => {
  if (!personality.systemDirectory) return undefined;
  const file = path.join(personality.systemDirectory, "WinMetadata", `${reference.name}.winmd`);
  return isFile(file) ? file : undefined;
};

/**
 * Find Windows Runtime metadata: the newest Windows 10 SDK reference
 * directory first, then `<System>/WinMetadata`.
 */
export const findWindowsMetadataFile = (
  reference: ModuleReference,
  personality: RuntimePersonality
): string | undefined => {
  if (personality.platform !== "win32") return undefined;

  const fallback = (): string | undefined =>
    findInSystemWinMetadata(reference, personality);

  if (!personality.programFilesX86) return fallback();
  const referencesRoot = path.join(personality.programFilesX86, "Windows Kits", "10", "References");
  if (!isDirectory(referencesRoot)) return fallback();

  // TODO: pick the SDK version matching the module instead of the last one listed
  const sdkVersions = listDirectories(referencesRoot);
  const sdkVersion = sdkVersions[sdkVersions.length - 1];
  if (sdkVersion === undefined) return fallback();

  const contractRoot = path.join(referencesRoot, sdkVersion, reference.name);
  if (!isDirectory(contractRoot)) return fallback();

  const versionDirectory = path.join(
    contractRoot,
    findClosestVersionDirectory(contractRoot, reference.version)
  );
  if (!isDirectory(versionDirectory)) return fallback();

  const file = path.join(versionDirectory, `${reference.name}.winmd`);
  return isFile(file) ? file : fallback();
};

export const silverlightRoots = (personality: RuntimePersonality): readonly string[] => {
  const roots: string[] = [];
  for (const programFiles of [personality.programFiles, personality.programFilesX86]) {
    if (!programFiles) continue;
    const root = path.join(programFiles, "Microsoft Silverlight");
    if (isDirectory(root) && !roots.includes(root)) roots.push(root);
  }
  return roots;
};

/**
 * Look in the closest-versioned Silverlight runtime directory.
 */
export const resolveSilverlight = (
  reference: ModuleReference,
  frameworkVersion: Version,
  personality: RuntimePersonality
): string | undefined => {
  if (personality.platform !== "win32") return undefined;
  for (const root of silverlightRoots(personality)) {
    const versionDirectory = path.join(root, findClosestVersionDirectory(root, frameworkVersion));
    const file = searchDirectory(reference, versionDirectory);
    if (file) return file;
  }
  return undefined;
};
