export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface SourceLocation {
  file: string;
  /** 1-based; 0 when the diagnostic is about the module as a whole. */
  line: number;
  column: number;
  offset: number;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: SourceLocation;
}

/** Location of a diagnostic that has no position inside `file`. */
export function moduleLocation(file: string): SourceLocation {
  return { file, line: 0, column: 0, offset: 0 };
}
