/**
 * Global assembly cache lookup (Mono and .NET Framework layouts)
 */

import * as path from "node:path";
import type { ModuleReference } from "../types/metadata.js";
import { formatVersion } from "../metadata/version.js";
import { hasPublicKeyToken } from "../metadata/module-reference.js";
import type { RuntimePersonality } from "./runtime-personality.js";
import { isDirectory, isFile } from "./probe.js";

const NET_GAC_KINDS = ["GAC_MSIL", "GAC_32", "GAC_64", "GAC"] as const;

/** Version directory prefix per .NET GAC root: the 4.0 GAC prefixes "v4.0_" */
const NET_GAC_PREFIXES = ["", "v4.0_"] as const;

const pathDelimiter = (personality: RuntimePersonality): string =>
  personality.platform === "win32" ? ";" : ":";

/**
 * Roots of the GAC for a runtime personality.
 *
 * Mono: the runtime's own `../gac` plus `<prefix>/lib/mono/gac` for every
 * existing MONO_GAC_PREFIX entry. .NET: `<windir>/assembly` and
 * `<windir>/Microsoft.NET/assembly`.
 */
export const gacRoots = (personality: RuntimePersonality): readonly string[] => {
  if (personality.flavor === "mono") {
    const roots: string[] = [];
    if (personality.baseLibraryDirectory) {
      roots.push(path.join(path.dirname(personality.baseLibraryDirectory), "gac"));
    }
    for (const prefix of (personality.monoGacPrefix ?? "").split(pathDelimiter(personality))) {
      if (prefix.length === 0) continue;
      const root = path.join(prefix, "lib", "mono", "gac");
      if (isDirectory(root) && !roots.includes(root)) {
        roots.push(root);
      }
    }
    return roots;
  }

  const windir = personality.windowsDirectory;
  if (!windir) return [];
  return [path.join(windir, "assembly"), path.join(windir, "Microsoft.NET", "assembly")];
};

/** `<gac>/<name>/<prefix><version>__<token>/<name>.dll` */
export const gacFilePath = (
  reference: ModuleReference,
  prefix: string,
  gac: string
): string =>
  path.join(
    gac,
    reference.name,
    `${prefix}${formatVersion(reference.version)}__${reference.publicKeyToken ?? ""}`,
    `${reference.name}.dll`
  );

/**
 * Find a strong-named reference in the GAC. Unsigned references are never
 * looked up there.
 */
export const findInGac = (
  reference: ModuleReference,
  personality: RuntimePersonality,
  roots: readonly string[] = gacRoots(personality)
): string | undefined => {
  if (!hasPublicKeyToken(reference)) return undefined;

  if (personality.flavor === "mono") {
    for (const root of roots) {
      const file = gacFilePath(reference, "", root);
      if (isFile(file)) return file;
    }
    return undefined;
  }

  for (let i = 0; i < roots.length; i++) {
    const root = roots[i];
    const prefix = NET_GAC_PREFIXES[i];
    if (root === undefined || prefix === undefined) continue;
    for (const kind of NET_GAC_KINDS) {
      const gac = path.join(root, kind);
      const file = gacFilePath(reference, prefix, gac);
      if (isDirectory(gac) && isFile(file)) return file;
    }
  }
  return undefined;
};
