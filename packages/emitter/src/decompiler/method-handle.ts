/**
 * Method handles: a method definition with its declaring type and module
 */

import type {
  MethodDefinition,
  TypeDefinition,
  TypeSystemModule,
} from "@dnpeek/frontend";

export type MethodHandle = {
  readonly module: TypeSystemModule;
  readonly declaringType: TypeDefinition;
  readonly method: MethodDefinition;
};

export const methodHandleName = (handle: MethodHandle): string =>
  `${handle.declaringType.fullName}.${handle.method.name}`;

/** Handles of every method of a type, in declaration order */
export const methodHandlesOf = (
  module: TypeSystemModule,
  declaringType: TypeDefinition
): readonly MethodHandle[] =>
  declaringType.methods.map((method) => ({ module, declaringType, method }));
