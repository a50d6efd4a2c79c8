/**
 * Debug information of a decompiled method
 */

import type { TypeSignature } from "@dnpeek/frontend";
import type { FunctionIR } from "./function-ir.js";
import type { MethodHandle } from "./method-handle.js";

export type StateMachineKind = "none" | "async" | "iterator";

export type SourceLocal = {
  readonly name: string;
  readonly slot: number;
  readonly type: TypeSignature;
};

export type SourceParameter = {
  readonly name: string;
  readonly index: number;
  readonly type: TypeSignature;
};

export type MethodDebugInfo = {
  readonly stateMachineKind: StateMachineKind;
  /** The method that was decompiled */
  readonly method: MethodHandle;
  /** Move-next method of the state machine, or `method` */
  readonly stateMachineMethod: MethodHandle;
  /** Present only when a move-next method exists */
  readonly kickoffMethod?: MethodHandle;
  readonly locals: readonly SourceLocal[];
  readonly parameters: readonly SourceParameter[];
};

const stateMachineKind = (fn: FunctionIR): StateMachineKind => {
  if (fn.isAsync) return "async";
  if (fn.isIterator) return "iterator";
  return "none";
};

/** Locals keyed by debug slot; later variables sharing a slot are folded in */
const sourceLocals = (fn: FunctionIR): readonly SourceLocal[] => {
  const bySlot = new Map<number, SourceLocal>();
  for (const variable of fn.variables) {
    if (variable.originalSlot === undefined || variable.kind === "parameter") continue;
    if (bySlot.has(variable.originalSlot)) continue;
    bySlot.set(variable.originalSlot, {
      name: variable.name,
      slot: variable.originalSlot,
      type: variable.type,
    });
  }
  return [...bySlot.values()];
};

export const createMethodDebugInfo = (fn: FunctionIR): MethodDebugInfo => {
  const moveNext = fn.moveNextMethod;
  const info = {
    stateMachineKind: stateMachineKind(fn),
    method: fn.method,
    stateMachineMethod: moveNext ?? fn.method,
    locals: sourceLocals(fn),
    parameters: fn.parameters.map((v) => ({ name: v.name, index: v.index, type: v.type })),
  };
  return moveNext ? { ...info, kickoffMethod: fn.method } : info;
};
