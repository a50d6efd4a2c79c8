/**
 * dnpeek frontend - module metadata, framework identification, reference
 * resolution and type system assembly
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/metadata.js";
export * from "./types/result.js";

export * from "./metadata/index.js";
export * from "./framework/index.js";
export * from "./resolver/index.js";
export * from "./type-system/index.js";
