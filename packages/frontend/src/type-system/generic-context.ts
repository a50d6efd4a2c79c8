/**
 * Generic contexts: naming and instantiating generic parameters
 */

import type { TypeSignature } from "../types/metadata.js";
import { mapTypeSignature } from "../metadata/signatures.js";
import type { MethodDefinition, TypeDefinition } from "./module-view.js";

export type GenericContext = {
  readonly typeParameters: readonly string[];
  readonly methodParameters: readonly string[];
};

export const emptyGenericContext: GenericContext = {
  typeParameters: [],
  methodParameters: [],
};

export const createGenericContext = (
  type?: TypeDefinition,
  method?: MethodDefinition
): GenericContext => ({
  typeParameters: type?.genericParameters ?? [],
  methodParameters: method?.genericParameters ?? [],
});

/**
 * Attach parameter names from the context to every generic parameter the
 * signature mentions. Indices outside the context stay unnamed.
 */
export const resolveInGenericContext = (
  signature: TypeSignature,
  context: GenericContext
): TypeSignature =>
  mapTypeSignature(signature, (node) => {
    if (node.kind !== "genericParameter") return undefined;
    const names = node.owner === "type" ? context.typeParameters : context.methodParameters;
    const name = names[node.index];
    return name === undefined ? node : { ...node, name };
  });

/**
 * Replace generic parameters with the given arguments. Parameters without a
 * matching argument are left as they are.
 */
export const substituteGenericArguments = (
  signature: TypeSignature,
  typeArguments: readonly TypeSignature[],
  methodArguments: readonly TypeSignature[] = []
): TypeSignature =>
  mapTypeSignature(signature, (node) => {
    if (node.kind !== "genericParameter") return undefined;
    const args = node.owner === "type" ? typeArguments : methodArguments;
    return args[node.index] ?? node;
  });
