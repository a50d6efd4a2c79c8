/**
 * Decompiler settings
 */

import type { TypeSystemSettings } from "@dnpeek/frontend";

export type DecompilerSettings = TypeSystemSettings & {
  /** False: definitions only, bodies are not translated */
  readonly decompileMemberBodies: boolean;
  readonly useDebugSymbols: boolean;
  readonly calculateSourceSpans: boolean;
  readonly useImplicitMethodGroupConversion: boolean;
  readonly usingDeclarations: boolean;
  readonly alwaysCastTargetsOfExplicitInterfaceImplementationCalls: boolean;
  readonly namedArguments: boolean;
  readonly alwaysQualifyMemberReferences: boolean;
};

export const defaultDecompilerSettings: DecompilerSettings = {
  dynamic: true,
  tupleTypes: true,
  extensionMethods: true,
  decimalConstants: true,
  decompileMemberBodies: true,
  useDebugSymbols: true,
  calculateSourceSpans: false,
  useImplicitMethodGroupConversion: true,
  usingDeclarations: true,
  alwaysCastTargetsOfExplicitInterfaceImplementationCalls: false,
  namedArguments: true,
  alwaysQualifyMemberReferences: false,
};

export const cloneSettings = (
  settings: DecompilerSettings,
  overrides: Partial<DecompilerSettings> = {}
): DecompilerSettings => ({ ...settings, ...overrides });

/**
 * Settings for designer-generated InitializeComponent methods, which the
 * forms designer must be able to read back.
 */
export const windowsFormsSettings = (settings: DecompilerSettings): DecompilerSettings =>
  cloneSettings(settings, {
    useImplicitMethodGroupConversion: false,
    usingDeclarations: false,
    alwaysCastTargetsOfExplicitInterfaceImplementationCalls: true,
    namedArguments: false,
    alwaysQualifyMemberReferences: true,
  });
