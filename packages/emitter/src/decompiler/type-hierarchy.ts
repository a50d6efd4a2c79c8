/**
 * Base type chains through the assembled type system
 */

import {
  qualifiedName,
  removePinnedAndModifiers,
  type TypeDefinition,
  type TypeSystemClosure,
} from "@dnpeek/frontend";
import type { DecompileRun } from "./decompile-run.js";

/**
 * Full names of the type's base classes, nearest first. A base type that
 * does not resolve still contributes its name and ends the chain.
 */
export const nonInterfaceBaseTypes = (
  type: TypeDefinition,
  typeSystem: TypeSystemClosure
): readonly string[] => {
  const chain: string[] = [];
  const seen = new Set<string>([type.fullName]);
  let signature = type.baseType;
  while (signature) {
    const stripped = removePinnedAndModifiers(signature);
    const definition = typeSystem.resolveTypeDefinition(stripped);
    const name =
      definition?.fullName ??
      (stripped.kind === "named" ? qualifiedName(stripped.namespace, stripped.name) : undefined);
    if (name === undefined || seen.has(name)) break;
    seen.add(name);
    chain.push(name);
    signature = definition?.baseType;
  }
  return chain;
};

export const derivesFrom = (
  type: TypeDefinition,
  baseFullName: string,
  typeSystem: TypeSystemClosure,
  run?: DecompileRun
): boolean => {
  const chain = run
    ? run.baseTypesOf(type.fullName, () => nonInterfaceBaseTypes(type, typeSystem))
    : nonInterfaceBaseTypes(type, typeSystem);
  return chain.includes(baseFullName);
};
