/**
 * Method Decompilation Orchestrator - public API
 */

export { MethodDecompiler } from "./method-decompiler.js";
export type { DecompiledMethod, MethodDecompilerOptions } from "./method-decompiler.js";
export {
  decompileMethodBody,
  isWindowsFormsInitializeComponent,
  WINDOWS_FORMS_CONTROL,
} from "./method-body-builder.js";
export type { MethodBodyContext, MethodBodyResult } from "./method-body-builder.js";
export { decompileEmptyBody } from "./empty-body.js";
export type { EmptyBodyResult } from "./empty-body.js";
export { selectBaseConstructor, accessRank } from "./base-constructor.js";
export type { BaseConstructorChoice } from "./base-constructor.js";
export { createMethodDeclaration, byRefElementType } from "./declarations.js";
export { nonInterfaceBaseTypes, derivesFrom } from "./type-hierarchy.js";
export { FunctionIR } from "./function-ir.js";
export type { ILVariable, ILPhase, InstructionNode, VariableKind } from "./function-ir.js";
export { createMethodDebugInfo } from "./debug-info.js";
export type {
  MethodDebugInfo,
  SourceLocal,
  SourceParameter,
  StateMachineKind,
} from "./debug-info.js";
export { methodHandleName, methodHandlesOf } from "./method-handle.js";
export type { MethodHandle } from "./method-handle.js";
export { DecompileRun } from "./decompile-run.js";
export {
  defaultDecompilerSettings,
  cloneSettings,
  windowsFormsSettings,
} from "./settings.js";
export type { DecompilerSettings } from "./settings.js";
export { DecompilerError, OperationCanceledError, isOperationCanceled } from "./errors.js";
export { throwIfCancellationRequested } from "./cancellation.js";
export { isStateMachineDetector } from "./collaborators.js";
export type {
  InstructionReader,
  ReadOptions,
  StatementBuilder,
  StatementBuilderContext,
  StateMachineDetector,
  Transform,
  TransformContext,
} from "./collaborators.js";
