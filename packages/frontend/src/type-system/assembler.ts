/**
 * Type System Assembler - build the closed-world type system of a module
 *
 * Starting at the main module, references are resolved breadth-first. Each
 * module joins the closure once, identified both by the full name of the
 * reference that led to it and by its real path on disk. Only the main
 * module's references and the targets of type forwarders are followed.
 * References that cannot be resolved are dropped with a warning; the closure
 * itself is always produced.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Diagnostic } from "../types/diagnostic.js";
import type { ModuleMetadata, ModuleReference, TypeSignature } from "../types/metadata.js";
import type { Result } from "../types/result.js";
import { referenceFullName, referencesMatch } from "../metadata/module-reference.js";
import { qualifiedName, removePinnedAndModifiers } from "../metadata/signatures.js";
import {
  resolveErrorToDiagnostic,
  type ResolvedModule,
  type ResolveError,
} from "../resolver/types.js";
import { TypeSystemOptions } from "./options.js";
import { TypeSystemModule, type TypeDefinition } from "./module-view.js";
import { REQUIRED_KNOWN_TYPES, knownTypeFullName } from "./known-types.js";
import { createFallbackCorlib } from "./fallback-corlib.js";

/** The part of the reference resolver the assembler depends on */
export type ModuleResolver = {
  resolve(reference: ModuleReference): Result<ResolvedModule | null, ResolveError>;
};

export type AssembleOptions = {
  readonly verbose?: boolean;
};

export type TypeSystemClosure = {
  readonly mainModule: TypeSystemModule;
  /** Main module first, then resolved modules in discovery order */
  readonly modules: readonly TypeSystemModule[];
  readonly options: TypeSystemOptions;
  readonly diagnostics: readonly Diagnostic[];
  findType(fullName: string): TypeDefinition | undefined;
  /** The module declaring a type, first match in module order */
  findTypeModule(fullName: string): TypeSystemModule | undefined;
  findModule(reference: ModuleReference): TypeSystemModule | undefined;
  resolveTypeDefinition(signature: TypeSignature): TypeDefinition | undefined;
  /** True when `caller` may see the internals of `target` */
  isFriendModule(caller: TypeSystemModule, target: TypeSystemModule): boolean;
};

const realPath = (filePath: string): string => {
  try {
    return fs.realpathSync(filePath);
  } catch {
    return path.resolve(filePath);
  }
};

const forwarderTargets = (metadata: ModuleMetadata): readonly ModuleReference[] =>
  metadata.exportedTypes.flatMap((exported) =>
    exported.forwardedTo ? [exported.forwardedTo] : []
  );

/** Full name of the definition a signature names, if it names one */
const definitionName = (signature: TypeSignature): string | undefined => {
  const stripped = removePinnedAndModifiers(signature);
  switch (stripped.kind) {
    case "named":
      return qualifiedName(stripped.namespace, stripped.name);
    case "tuple":
      return `System.ValueTuple\`${Math.min(stripped.elements.length, 8)}`;
    case "dynamic":
      return "System.Object";
    case "array":
      return "System.Array";
    case "byRef":
    case "pointer":
    case "pinned":
    case "modified":
    case "genericParameter":
      return undefined;
  }
};

const droppedReference = (reference: ModuleReference, cause: string): Diagnostic => ({
  code: "DNP3001",
  severity: "warning",
  message: `Referenced module dropped from the type system: ${referenceFullName(reference)}`,
  hint: cause,
});

export const assembleTypeSystem = (
  root: ResolvedModule,
  resolver: ModuleResolver,
  options: TypeSystemOptions = TypeSystemOptions.Default,
  assembleOptions: AssembleOptions = {}
): TypeSystemClosure => {
  const verbose = assembleOptions.verbose ?? false;
  const diagnostics: Diagnostic[] = [];
  const mainModule = new TypeSystemModule({
    metadata: root.metadata,
    filePath: root.filePath,
    options,
    isMainModule: true,
  });
  const modules: TypeSystemModule[] = [mainModule];

  const seenReferences = new Set<string>();
  const seenPaths = new Set<string>([realPath(root.filePath)]);
  const queue: ModuleReference[] = [
    ...root.metadata.references,
    ...forwarderTargets(root.metadata),
  ];

  for (let reference = queue.shift(); reference; reference = queue.shift()) {
    const key = referenceFullName(reference);
    if (seenReferences.has(key)) continue;
    seenReferences.add(key);

    const resolved = resolver.resolve(reference);
    if (!resolved.ok) {
      const cause = resolveErrorToDiagnostic(resolved.error).message;
      if (verbose) {
        console.warn(`[TypeSystem] Dropping ${key}: ${cause}`);
      }
      diagnostics.push(droppedReference(reference, cause));
      continue;
    }
    if (!resolved.value) {
      if (verbose) {
        console.warn(`[TypeSystem] Dropping ${key}: not found`);
      }
      diagnostics.push(droppedReference(reference, "Module could not be located"));
      continue;
    }

    const { filePath, metadata } = resolved.value;
    const real = realPath(filePath);
    if (seenPaths.has(real)) continue;
    seenPaths.add(real);

    if (verbose) {
      console.log(`[TypeSystem] Loaded ${metadata.name} from ${filePath}`);
    }
    modules.push(new TypeSystemModule({ metadata, filePath, options }));
    queue.push(...forwarderTargets(metadata));
  }

  const missing = REQUIRED_KNOWN_TYPES.filter((known) => {
    const fullName = knownTypeFullName(known);
    return !modules.some((module) => module.declaresType(fullName));
  });
  if (missing.length > 0) {
    const names = missing.map(knownTypeFullName);
    if (verbose) {
      console.warn(`[TypeSystem] Stubbing ${names.length} missing well-known types`);
    }
    diagnostics.push({
      code: "DNP3002",
      severity: "warning",
      message: `Missing well-known types replaced by stubs: ${names.join(", ")}`,
    });
    modules.push(createFallbackCorlib(missing, options));
  }

  const findTypeModule = (fullName: string): TypeSystemModule | undefined =>
    modules.find((module) => module.findTypeDefinition(fullName) !== undefined);

  const findType = (fullName: string): TypeDefinition | undefined =>
    findTypeModule(fullName)?.findTypeDefinition(fullName);

  return {
    mainModule,
    modules,
    options,
    diagnostics,
    findType,
    findTypeModule,
    findModule: (reference) =>
      modules.find((module) => referencesMatch(module.reference, reference)),
    resolveTypeDefinition: (signature) => {
      const fullName = definitionName(signature);
      return fullName === undefined ? undefined : findType(fullName);
    },
    isFriendModule: (caller, target) => target.internalsVisibleTo(caller),
  };
};
