/**
 * Synthetic core library for closures that lack well-known types
 */

import type { ModuleMetadata, TypeMetadata } from "../types/metadata.js";
import { namedType } from "../metadata/signatures.js";
import { zeroVersion } from "../metadata/version.js";
import type { KnownType } from "./known-types.js";
import type { TypeSystemOptions } from "./options.js";
import { TypeSystemModule } from "./module-view.js";

export const FALLBACK_CORLIB_NAME = "mscorlib";

const stubType = (known: KnownType): TypeMetadata => ({
  namespace: known.namespace,
  name: known.name,
  kind: known.kind,
  accessibility: "public",
  baseType: known.baseType ? namedType("System", known.baseType) : undefined,
  genericParameters: [],
  fields: [],
  methods: [],
  attributes: [],
});

/** A module declaring exactly the given types, with no members */
export const createFallbackCorlib = (
  missing: readonly KnownType[],
  options: TypeSystemOptions
): TypeSystemModule => {
  const metadata: ModuleMetadata = {
    name: FALLBACK_CORLIB_NAME,
    version: zeroVersion,
    internalsVisibleTo: [],
    references: [],
    exportedTypes: [],
    types: missing.map(stubType),
  };
  return new TypeSystemModule({ metadata, options, isSynthetic: true });
};
