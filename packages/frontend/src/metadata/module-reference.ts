/**
 * Module reference identity helpers
 */

import { createHash } from "node:crypto";
import type { ModuleMetadata, ModuleReference, Version } from "../types/metadata.js";
import { formatVersion, isZeroOrAllOnes, versionsEqual } from "./version.js";

export type ModuleReferenceOptions = {
  readonly culture?: string;
  readonly publicKeyToken?: string;
  readonly isRetargetable?: boolean;
  readonly isWindowsRuntime?: boolean;
};

export const createModuleReference = (
  name: string,
  version: Version,
  options: ModuleReferenceOptions = {}
): ModuleReference => ({
  name,
  version,
  culture: options.culture,
  publicKeyToken: options.publicKeyToken?.toLowerCase(),
  isRetargetable: options.isRetargetable ?? false,
  isWindowsRuntime: options.isWindowsRuntime ?? false,
});

export const hasPublicKeyToken = (reference: ModuleReference): boolean =>
  reference.publicKeyToken !== undefined && reference.publicKeyToken.length > 0;

/**
 * True when the reference pins no concrete version: the version is absent,
 * all zero or all 0xFFFF, or the reference is retargetable.
 */
export const isSpecialVersionOrRetargetable = (
  reference: ModuleReference
): boolean => isZeroOrAllOnes(reference.version) || reference.isRetargetable;

export const referenceFullName = (reference: ModuleReference): string => {
  const culture =
    reference.culture && reference.culture.length > 0
      ? reference.culture
      : "neutral";
  const token = hasPublicKeyToken(reference) ? reference.publicKeyToken : "null";
  const parts = [
    reference.name,
    `Version=${formatVersion(reference.version)}`,
    `Culture=${culture}`,
    `PublicKeyToken=${token}`,
  ];
  if (reference.isRetargetable) parts.push("Retargetable=Yes");
  if (reference.isWindowsRuntime) parts.push("ContentType=WindowsRuntime");
  return parts.join(", ");
};

export const referencesMatch = (
  a: ModuleReference,
  b: ModuleReference
): boolean => {
  if (a.name.toLowerCase() !== b.name.toLowerCase()) {
    return false;
  }
  if (
    hasPublicKeyToken(a) &&
    hasPublicKeyToken(b) &&
    a.publicKeyToken?.toLowerCase() !== b.publicKeyToken?.toLowerCase()
  ) {
    return false;
  }
  if (isSpecialVersionOrRetargetable(a) || isSpecialVersionOrRetargetable(b)) {
    return true;
  }
  return versionsEqual(a.version, b.version);
};

/**
 * Public key token of a full public key: the last 8 bytes of its SHA-1
 * hash, in reverse order.
 */
export const publicKeyTokenFromKey = (publicKeyHex: string): string => {
  const hash = createHash("sha1")
    .update(Buffer.from(publicKeyHex, "hex"))
    .digest();
  return Buffer.from(hash.subarray(hash.length - 8))
    .reverse()
    .toString("hex");
};

/** The reference other modules would use to name this module */
export const moduleIdentity = (module: ModuleMetadata): ModuleReference =>
  createModuleReference(module.name, module.version, {
    culture: module.culture,
    publicKeyToken:
      module.publicKeyToken ??
      (module.publicKey ? publicKeyTokenFromKey(module.publicKey) : undefined),
  });
