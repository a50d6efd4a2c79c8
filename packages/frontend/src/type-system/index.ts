/**
 * Type System Assembler - public API
 */

export { assembleTypeSystem } from "./assembler.js";
export type { AssembleOptions, ModuleResolver, TypeSystemClosure } from "./assembler.js";
export {
  TypeSystemOptions,
  hasOption,
  typeSystemOptionsFromSettings,
  formatTypeSystemOptions,
} from "./options.js";
export type { TypeSystemSettings } from "./options.js";
export { TypeSystemModule } from "./module-view.js";
export type {
  TypeDefinition,
  MethodDefinition,
  FieldDefinition,
  ParameterDefinition,
  TypeSystemModuleInit,
} from "./module-view.js";
export { REQUIRED_KNOWN_TYPES, knownTypeFullName } from "./known-types.js";
export type { KnownType } from "./known-types.js";
export { createFallbackCorlib, FALLBACK_CORLIB_NAME } from "./fallback-corlib.js";
export {
  createGenericContext,
  emptyGenericContext,
  resolveInGenericContext,
  substituteGenericArguments,
} from "./generic-context.js";
export type { GenericContext } from "./generic-context.js";
export {
  applyAttributeTypes,
  decimalConstantValue,
  findAttribute,
  hasAttribute,
  withoutAttributes,
} from "./attribute-types.js";
