import type { SourceFile } from "../utils/source.ts";
import type { Diagnostic } from "./diagnostic.ts";

/**
 * Format a diagnostic as `file:line:col: severity: message`, followed by the
 * source line and a caret when the source is at hand. Diagnostics without a
 * line (line 0) print as `file: severity: message`.
 */
export function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const loc = diag.location;
  const file = loc.file || "<unknown>";
  if (loc.line === 0) return `${file}: ${diag.severity}: ${diag.message}`;

  const header = `${file}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`;
  if (!source) return header;

  const srcLine = source.lineText(loc.line);
  if (srcLine === undefined) return header;

  const caret = `${" ".repeat(Math.max(loc.column - 1, 0))}^`;
  return `${header}\n  ${srcLine}\n  ${caret}`;
}
