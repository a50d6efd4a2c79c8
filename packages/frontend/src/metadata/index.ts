/**
 * Module metadata - Public API
 */

export { loadModuleImage, parseModuleImage, jsonModuleReader } from "./loader.js";
export type { ModuleReader } from "./loader.js";

export {
  zeroVersion,
  createVersion,
  parseVersion,
  compareVersions,
  versionsEqual,
  formatVersion,
  majorRevision,
  isZeroOrAllOnes,
} from "./version.js";

export {
  createModuleReference,
  hasPublicKeyToken,
  isSpecialVersionOrRetargetable,
  referenceFullName,
  referencesMatch,
  publicKeyTokenFromKey,
  moduleIdentity,
} from "./module-reference.js";
export type { ModuleReferenceOptions } from "./module-reference.js";

export {
  namedType,
  qualifiedName,
  isNamedType,
  isVoidType,
  removePinnedAndModifiers,
  parseSignatureText,
  formatSignature,
  mapTypeSignature,
} from "./signatures.js";
