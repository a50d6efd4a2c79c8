/**
 * Resolver type definitions
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { ModuleMetadata, ModuleReference, Version } from "../types/metadata.js";
import { formatVersion } from "../metadata/version.js";
import { referenceFullName } from "../metadata/module-reference.js";

/**
 * A module that was located and loaded.
 */
export type ResolvedModule = {
  readonly filePath: string;
  readonly metadata: ModuleMetadata;
};

/**
 * Outcome of locating a reference on disk.
 *
 * `fatal` is reserved for lookups that cannot proceed at all in strict mode
 * (e.g. a core library version no known layout provides).
 */
export type ResolveOutcome =
  | { readonly kind: "found"; readonly path: string }
  | { readonly kind: "notFound" }
  | { readonly kind: "fatal"; readonly reason: ResolveError };

export const found = (path: string): ResolveOutcome => ({ kind: "found", path });
export const notFound: ResolveOutcome = { kind: "notFound" };

export type ResolveError =
  | { readonly kind: "moduleNotFound"; readonly reference: ModuleReference }
  | { readonly kind: "unsupportedRuntimeVersion"; readonly version: Version }
  | {
      readonly kind: "unreadableModule";
      readonly path: string;
      readonly diagnostics: readonly Diagnostic[];
    };

export const resolveErrorToDiagnostic = (error: ResolveError): Diagnostic => {
  switch (error.kind) {
    case "moduleNotFound":
      return {
        code: "DNP1001",
        severity: "error",
        message: `Failed to resolve module reference: ${referenceFullName(error.reference)}`,
        hint: "Add the directory containing it with --lib",
      };
    case "unsupportedRuntimeVersion":
      return {
        code: "DNP1002",
        severity: "error",
        message: `Version not supported: ${formatVersion(error.version)}`,
      };
    case "unreadableModule":
      return {
        code: "DNP1003",
        severity: "error",
        message: `Located module could not be read: ${error.path}`,
        location: { file: error.path },
        hint: error.diagnostics[0]?.message,
      };
  }
};
