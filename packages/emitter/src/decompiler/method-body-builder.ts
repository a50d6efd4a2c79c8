/**
 * Method body decompilation
 *
 * Drives one method through the pipeline: read the instructions, annotate
 * the declaration, run the transforms, build the statement tree and collect
 * debug information. Cancellation is checked before the read and before
 * every transform, and never wrapped.
 */

import {
  createGenericContext,
  resolveInGenericContext,
  type TypeSystemClosure,
} from "@dnpeek/frontend";
import { block, comment, insertAfter, yieldBreak } from "../syntax/builders.js";
import type {
  BlockStatementSyntax,
  MemberDeclarationSyntax,
  ParameterSyntax,
  StatementSyntax,
} from "../syntax/types.js";
import { asCancellation, throwIfCancellationRequested } from "./cancellation.js";
import {
  isStateMachineDetector,
  type InstructionReader,
  type StatementBuilder,
  type Transform,
  type TransformContext,
} from "./collaborators.js";
import type { DecompileRun } from "./decompile-run.js";
import { createMethodDebugInfo, type MethodDebugInfo } from "./debug-info.js";
import { DecompilerError } from "./errors.js";
import type { FunctionIR } from "./function-ir.js";
import { methodHandleName, type MethodHandle } from "./method-handle.js";
import { cloneSettings, windowsFormsSettings, type DecompilerSettings } from "./settings.js";
import { derivesFrom } from "./type-hierarchy.js";

export const WINDOWS_FORMS_CONTROL = "System.Windows.Forms.Control";

export type MethodBodyContext = {
  readonly typeSystem: TypeSystemClosure;
  readonly settings: DecompilerSettings;
  readonly reader: InstructionReader;
  readonly transforms: readonly Transform[];
  readonly statementBuilder: StatementBuilder;
  readonly run: DecompileRun;
  readonly signal?: AbortSignal;
  readonly verbose?: boolean;
};

export type MethodBodyResult = {
  readonly declaration: MemberDeclarationSyntax;
  /** Absent in definitions-only mode */
  readonly body?: BlockStatementSyntax;
  readonly function: FunctionIR;
  readonly debugInfo: MethodDebugInfo;
};

/** Designer-generated `void InitializeComponent()` of a forms control */
export const isWindowsFormsInitializeComponent = (
  handle: MethodHandle,
  typeSystem: TypeSystemClosure,
  run?: DecompileRun
): boolean => {
  const { method, declaringType } = handle;
  const returnType = method.returnType;
  return (
    method.name === "InitializeComponent" &&
    returnType.kind === "named" &&
    returnType.namespace === "System" &&
    returnType.name === "Void" &&
    derivesFrom(declaringType, WINDOWS_FORMS_CONTROL, typeSystem, run)
  );
};

/**
 * Attach the IR variable of each parameter to its declaration, typed by the
 * declared parameter type.
 */
const annotateParameters = (
  declaration: MemberDeclarationSyntax,
  fn: FunctionIR,
  handle: MethodHandle
): MemberDeclarationSyntax => {
  const context = createGenericContext(handle.declaringType, handle.method);
  const byIndex = new Map(fn.parameters.map((variable) => [variable.index, variable] as const));
  const parameters: ParameterSyntax[] = declaration.parameters.map((parameter, index) => {
    const variable = byIndex.get(index);
    if (!variable) return parameter;
    const declared = handle.method.parameters[index]?.type ?? variable.type;
    return { ...parameter, annotation: { variable, type: resolveInGenericContext(declared, context) } };
  });
  return { ...declaration, parameters };
};

/** Index of the last state machine detector, or -1 */
const lastDetectorIndex = (transforms: readonly Transform[]): number => {
  for (let i = transforms.length - 1; i >= 0; i--) {
    const transform = transforms[i];
    if (transform && isStateMachineDetector(transform)) return i;
  }
  return -1;
};

const withWarnings = (body: BlockStatementSyntax, warnings: readonly string[]): BlockStatementSyntax => {
  let result = body;
  let anchor: StatementSyntax | undefined;
  for (const warning of warnings) {
    const statement = comment(warning);
    result = insertAfter(result, anchor, statement);
    anchor = statement;
  }
  return result;
};

const withAsyncModifier = (declaration: MemberDeclarationSyntax): MemberDeclarationSyntax =>
  declaration.modifiers.includes("async")
    ? declaration
    : { ...declaration, modifiers: [...declaration.modifiers, "async"] };

const containsYieldReturn = (statement: StatementSyntax): boolean => {
  switch (statement.kind) {
    case "yieldReturnStatement":
      return true;
    case "blockStatement":
      return statement.statements.some(containsYieldReturn);
    case "ifStatement":
      return (
        containsYieldReturn(statement.thenStatement) ||
        (statement.elseStatement !== undefined && containsYieldReturn(statement.elseStatement))
      );
    default:
      return false;
  }
};

/** An iterator that never yields a value still needs `yield break` to be one */
const withIteratorEnd = (body: BlockStatementSyntax): BlockStatementSyntax =>
  containsYieldReturn(body) ? body : block([...body.statements, yieldBreak()]);

export const decompileMethodBody = (
  handle: MethodHandle,
  declaration: MemberDeclarationSyntax,
  context: MethodBodyContext
): MethodBodyResult => {
  const { signal, typeSystem, run } = context;
  try {
    throwIfCancellationRequested(signal);
    const fn = context.reader.read(handle, {
      useDebugSymbols: context.settings.useDebugSymbols,
      calculateSourceSpans: context.settings.calculateSourceSpans,
      signal,
    });
    fn.checkInvariant("normal");

    let annotated = annotateParameters(declaration, fn, handle);

    const settings = isWindowsFormsInitializeComponent(handle, typeSystem, run)
      ? windowsFormsSettings(context.settings)
      : cloneSettings(context.settings);
    const transformContext: TransformContext = { signal, settings, typeSystem, run };

    const detector = settings.decompileMemberBodies ? -1 : lastDetectorIndex(context.transforms);
    const last = detector >= 0 ? detector : context.transforms.length - 1;

    for (const [index, transform] of context.transforms.entries()) {
      if (index > last) break;
      throwIfCancellationRequested(signal);
      if (context.verbose) {
        console.log(`[Decompiler] ${methodHandleName(handle)}: ${transform.name}`);
      }
      transform.run(fn, transformContext);
      fn.checkInvariant("normal");
    }

    if (fn.isAsync) {
      annotated = withAsyncModifier(annotated);
    }

    let body: BlockStatementSyntax | undefined;
    if (settings.decompileMemberBodies) {
      throwIfCancellationRequested(signal);
      const built = context.statementBuilder.buildBlock(fn, transformContext);
      fn.checkInvariant("inStatementBuilder");
      body = withWarnings(built, fn.warnings);
      if (fn.isIterator) {
        body = withIteratorEnd(body);
      }
    }

    const result = body ? { ...annotated, body, function: fn } : { ...annotated, function: fn };
    return {
      declaration: result,
      body,
      function: fn,
      debugInfo: createMethodDebugInfo(fn),
    };
  } catch (error) {
    const canceled = asCancellation(error, signal);
    if (canceled) throw canceled;
    if (error instanceof DecompilerError) throw error;
    throw new DecompilerError(handle, error);
  }
};
