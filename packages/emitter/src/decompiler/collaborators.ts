/**
 * Contracts of the collaborators the orchestrator drives: the instruction
 * reader, the transform pipeline and the statement builder.
 */

import type { TypeSystemClosure } from "@dnpeek/frontend";
import type { BlockStatementSyntax } from "../syntax/types.js";
import type { DecompileRun } from "./decompile-run.js";
import type { FunctionIR } from "./function-ir.js";
import type { MethodHandle } from "./method-handle.js";
import type { DecompilerSettings } from "./settings.js";

export type ReadOptions = {
  readonly useDebugSymbols: boolean;
  readonly calculateSourceSpans: boolean;
  readonly signal?: AbortSignal;
};

export type InstructionReader = {
  read(method: MethodHandle, options: ReadOptions): FunctionIR;
};

export type TransformContext = {
  readonly signal?: AbortSignal;
  readonly settings: DecompilerSettings;
  readonly typeSystem: TypeSystemClosure;
  readonly run: DecompileRun;
};

export type Transform = {
  readonly name: string;
  run(fn: FunctionIR, context: TransformContext): void;
};

/** Sets `isAsync` or `isIterator` on the function it recognises */
export type StateMachineDetector = Transform & {
  readonly detects: "async" | "iterator";
};

export const isStateMachineDetector = (
  transform: Transform
): transform is StateMachineDetector => "detects" in transform;

export type StatementBuilderContext = TransformContext;

export type StatementBuilder = {
  /** Translate the transformed function body; warnings go to `fn.warnings` */
  buildBlock(fn: FunctionIR, context: StatementBuilderContext): BlockStatementSyntax;
};
