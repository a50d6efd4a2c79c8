/**
 * Diagnostic types for dnpeek
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Reference resolution (DNP1001-DNP1099)
  | "DNP1001" // Module not found
  | "DNP1002" // Unsupported runtime version for corlib lookup
  | "DNP1003" // Located module could not be read
  // Framework identification (DNP2001-DNP2099)
  | "DNP2001" // Target framework could not be identified
  // Type system assembly (DNP3001-DNP3099)
  | "DNP3001" // Referenced module dropped from the type system
  | "DNP3002" // Missing well-known types replaced by stubs
  // Method decompilation (DNP6001-DNP6099)
  | "DNP6001" // Method decompilation failed
  | "DNP6002" // Base type of constructor could not be resolved
  // Module image loading (DNP9001-DNP9014)
  | "DNP9001" // Module image not found
  | "DNP9002" // Failed to read module image
  | "DNP9003" // Invalid JSON in module image
  | "DNP9004" // Module image must be an object
  | "DNP9005" // Missing or invalid 'name' field
  | "DNP9006" // Missing or invalid 'version' field
  | "DNP9007" // Invalid module reference
  | "DNP9008" // Missing or invalid 'types' field
  | "DNP9009" // Invalid type definition
  | "DNP9010" // Invalid type signature
  | "DNP9011" // Invalid method definition
  | "DNP9012" // Invalid field definition
  | "DNP9013" // Invalid exported type
  | "DNP9014"; // Invalid attribute

export type SourceLocation = {
  readonly file: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(`${diagnostic.location.file}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
