/**
 * File system probing primitives shared by all resolution strategies
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ModuleReference, Version } from "../types/metadata.js";
import { compareVersions, formatVersion, parseVersion } from "../metadata/version.js";

export const isFile = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    // Unreadable candidates are skipped
    return false;
  }
};

export const isDirectory = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
};

export const listDirectories = (base: string): readonly string[] => {
  try {
    return fs
      .readdirSync(base, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
};

export const moduleExtensions = (reference: ModuleReference): readonly string[] =>
  reference.isWindowsRuntime ? [".winmd", ".dll"] : [".exe", ".dll"];

/**
 * Look for `<directory>/<name><ext>` for each candidate extension in order.
 */
export const searchDirectory = (
  reference: ModuleReference,
  directory: string
): string | undefined => {
  for (const extension of moduleExtensions(reference)) {
    const file = path.join(directory, reference.name + extension);
    if (isFile(file)) return file;
  }
  return undefined;
};

export const searchDirectories = (
  reference: ModuleReference,
  directories: Iterable<string>
): string | undefined => {
  for (const directory of directories) {
    const file = searchDirectory(reference, directory);
    if (file) return file;
  }
  return undefined;
};

/**
 * Name of the version-named subdirectory of `basePath` closest to `version`:
 * the lowest one at or above it, else the highest one, else the requested
 * version itself.
 */
export const findClosestVersionDirectory = (
  basePath: string,
  version: Version
): string => {
  const versioned = listDirectories(basePath)
    .map((name) => ({ name, version: parseVersion(name) }))
    .filter(
      (entry): entry is { name: string; version: Version } =>
        entry.version !== undefined
    )
    .sort((a, b) => compareVersions(b.version, a.version));

  let closest: string | undefined;
  for (const entry of versioned) {
    if (closest === undefined || compareVersions(entry.version, version) >= 0) {
      closest = entry.name;
    }
  }
  return closest ?? formatVersion(version);
};
