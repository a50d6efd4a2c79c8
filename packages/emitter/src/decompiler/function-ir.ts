/**
 * Per-method intermediate representation
 *
 * A FunctionIR is produced by the instruction reader, mutated in place by
 * the transform pipeline and finally handed to the statement builder. One
 * instance belongs to exactly one in-flight decompilation.
 */

import type { TypeSignature } from "@dnpeek/frontend";
import type { MethodHandle } from "./method-handle.js";

export type VariableKind = "parameter" | "local" | "stackSlot";

export type ILVariable = {
  readonly kind: VariableKind;
  /** Parameter position or local slot; -1 for `this` */
  readonly index: number;
  readonly name: string;
  readonly type: TypeSignature;
  /** Local slot in the method's debug information, when the variable has one */
  readonly originalSlot?: number;
};

/** Opaque instruction tree; only transforms look inside */
export type InstructionNode = {
  readonly opCode: string;
  readonly operand?: string | number;
  readonly children: InstructionNode[];
};

export type ILPhase = "normal" | "inStatementBuilder";

export class FunctionIR {
  readonly method: MethodHandle;
  body: InstructionNode;
  readonly variables: ILVariable[];
  readonly warnings: string[] = [];
  isAsync = false;
  isIterator = false;
  /** Compiler-generated move-next method of a detected state machine */
  moveNextMethod: MethodHandle | undefined;

  constructor(method: MethodHandle, body: InstructionNode, variables: readonly ILVariable[] = []) {
    this.method = method;
    this.body = body;
    this.variables = [...variables];
  }

  get parameters(): readonly ILVariable[] {
    return this.variables.filter((v) => v.kind === "parameter");
  }

  /**
   * Structural checks every transform must preserve. Throws on violation.
   */
  checkInvariant(phase: ILPhase): void {
    const seen = new Set<number>();
    for (const variable of this.parameters) {
      if (seen.has(variable.index)) {
        throw new Error(`ICE: Duplicate parameter variable ${variable.index} (${phase})`);
      }
      seen.add(variable.index);
      if (variable.index >= this.method.method.parameters.length) {
        throw new Error(`ICE: Parameter variable ${variable.index} out of range (${phase})`);
      }
    }
    if (this.moveNextMethod && !this.isAsync && !this.isIterator) {
      throw new Error(`ICE: Move-next method without a state machine (${phase})`);
    }
  }
}
