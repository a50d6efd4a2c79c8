/**
 * MethodDecompiler - per-method driver over a batch of handles
 *
 * Methods with a body go through the transform pipeline; methods without
 * one get a synthesized stub body. A method that fails is reported with a
 * diagnostic and the batch moves on; cancellation ends the batch.
 */

import { createDiagnostic, type Diagnostic, type TypeSystemClosure } from "@dnpeek/frontend";
import type { InstructionReader, StatementBuilder, Transform } from "./collaborators.js";
import { DecompileRun } from "./decompile-run.js";
import type { MethodDebugInfo } from "./debug-info.js";
import { createMethodDeclaration } from "./declarations.js";
import { decompileEmptyBody } from "./empty-body.js";
import { asCancellation } from "./cancellation.js";
import { DecompilerError } from "./errors.js";
import { decompileMethodBody } from "./method-body-builder.js";
import { methodHandleName, type MethodHandle } from "./method-handle.js";
import { defaultDecompilerSettings, type DecompilerSettings } from "./settings.js";
import type { MemberDeclarationSyntax } from "../syntax/types.js";

export type MethodDecompilerOptions = {
  readonly typeSystem: TypeSystemClosure;
  readonly reader: InstructionReader;
  readonly transforms: readonly Transform[];
  readonly statementBuilder: StatementBuilder;
  readonly settings?: DecompilerSettings;
  readonly signal?: AbortSignal;
  readonly verbose?: boolean;
};

export type DecompiledMethod =
  | {
      readonly kind: "body";
      readonly handle: MethodHandle;
      readonly declaration: MemberDeclarationSyntax;
      readonly debugInfo: MethodDebugInfo;
      readonly diagnostics: readonly Diagnostic[];
    }
  | {
      /** Abstract and interface methods keep a bodiless declaration */
      readonly kind: "declaration";
      readonly handle: MethodHandle;
      readonly declaration: MemberDeclarationSyntax;
      readonly diagnostics: readonly Diagnostic[];
    }
  | {
      readonly kind: "emptyBody";
      readonly handle: MethodHandle;
      readonly declaration: MemberDeclarationSyntax;
      readonly diagnostics: readonly Diagnostic[];
    }
  | {
      readonly kind: "failed";
      readonly handle: MethodHandle;
      readonly error: DecompilerError;
      readonly diagnostics: readonly Diagnostic[];
    };

const failureDiagnostic = (error: DecompilerError): Diagnostic => {
  const file = error.method.module.filePath;
  return createDiagnostic("DNP6001", "error", error.message, file ? { file } : undefined);
};

export class MethodDecompiler {
  readonly run = new DecompileRun();
  private readonly settings: DecompilerSettings;

  constructor(private readonly options: MethodDecompilerOptions) {
    this.settings = options.settings ?? defaultDecompilerSettings;
  }

  decompileMethod(handle: MethodHandle): DecompiledMethod {
    const { typeSystem, verbose } = this.options;
    try {
      const declaration = createMethodDeclaration(handle);

      if (handle.method.isAbstract || handle.declaringType.kind === "interface") {
        return { kind: "declaration", handle, declaration, diagnostics: [] };
      }

      if (!handle.method.hasBody) {
        if (verbose) {
          console.log(`[Decompiler] Synthesizing empty body for ${methodHandleName(handle)}`);
        }
        const { body, diagnostics } = decompileEmptyBody(handle, typeSystem, declaration);
        return { kind: "emptyBody", handle, declaration: { ...declaration, body }, diagnostics };
      }

      if (verbose) {
        console.log(`[Decompiler] Decompiling ${methodHandleName(handle)}`);
      }
      const result = decompileMethodBody(handle, declaration, {
        typeSystem,
        settings: this.settings,
        reader: this.options.reader,
        transforms: this.options.transforms,
        statementBuilder: this.options.statementBuilder,
        run: this.run,
        signal: this.options.signal,
        verbose,
      });
      return {
        kind: "body",
        handle,
        declaration: result.declaration,
        debugInfo: result.debugInfo,
        diagnostics: [],
      };
    } catch (error) {
      const canceled = asCancellation(error, this.options.signal);
      if (canceled) throw canceled;
      const wrapped = error instanceof DecompilerError ? error : new DecompilerError(handle, error);
      if (verbose) {
        console.warn(`[Decompiler] ${wrapped.message}`);
      }
      return { kind: "failed", handle, error: wrapped, diagnostics: [failureDiagnostic(wrapped)] };
    }
  }

  /** Decompile in order; a cancellation stops the batch and propagates */
  decompileMethods(handles: readonly MethodHandle[]): readonly DecompiledMethod[] {
    return handles.map((handle) => this.decompileMethod(handle));
  }
}
