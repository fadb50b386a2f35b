import type { Diagnostic } from "./types/pipeline";

function formatLocation(diagnostic: Diagnostic): string | null {
  if (!diagnostic.file) return null;
  if (diagnostic.line === undefined) return diagnostic.file;
  if (diagnostic.column === undefined) return `${diagnostic.file}:${diagnostic.line}`;
  return `${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`;
}

/**
 * Renders one diagnostic as `<file>:<line>:<column> - <severity> <code> in module <M>: <message>`.
 * Parts that are not known are left out.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  let head: string = diagnostic.severity;
  if (diagnostic.code) head += ` ${diagnostic.code}`;
  if (diagnostic.module) head += ` in module ${diagnostic.module}`;
  const location = formatLocation(diagnostic);
  const prefix = location ? `${location} - ${head}` : head;
  return `${prefix}: ${diagnostic.message}`;
}

export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics.map(formatDiagnostic).join("\n");
}
