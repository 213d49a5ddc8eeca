export { type Diagnostic, moduleLocation, Severity, type SourceLocation } from "./diagnostic.ts";
export { DelegateError, type DelegateErrorCode, type DelegateErrorDetails } from "./delegate-error.ts";
export { formatDiagnostic } from "./format.ts";
