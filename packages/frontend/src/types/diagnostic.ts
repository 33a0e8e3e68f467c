/**
 * Diagnostic types for Bridgeforge
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Conversion errors (BRG2001-BRG2099)
  | "BRG2001" // Raw module has no content
  | "BRG2002" // Requested value type is not safe to pass by value
  | "BRG2003" // Unsupported item inside a foreign block
  // Raw module loading errors (BRG9001-BRG9010)
  | "BRG9001" // Raw module file not found
  | "BRG9002" // Failed to read raw module file
  | "BRG9003" // Invalid JSON in raw module file
  | "BRG9004" // Raw module must be an object
  | "BRG9005" // Missing or invalid 'name' field
  | "BRG9006" // 'content' must be an array if present
  | "BRG9007" // Invalid item
  | "BRG9008" // Invalid type
  | "BRG9009" // Invalid foreign item
  | "BRG9010"; // Invalid parameter

export type SourceLocation = {
  readonly file: string;
  /** JSON pointer into the document, e.g. `/content/3/fields/0` */
  readonly pointer: string;
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

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(`${diagnostic.location.file}#${diagnostic.location.pointer}`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
