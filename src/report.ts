import type { Diagnostic, DiagramModel } from "./types.js";

export function formatDiagnostic(diagnostic: Diagnostic, file?: string): string {
  const location = file ? `${file}:${diagnostic.line}` : `line ${diagnostic.line}`;
  return `${location} ${diagnostic.severity} [${diagnostic.kind}] ${diagnostic.message}`;
}

export function formatSummary(model: DiagramModel, diagnostics: Diagnostic[]): string {
  const { lanes, nodes, edges, canvas } = model;
  const errors = diagnostics.filter((diagnostic) => diagnostic.severity === "error").length;
  const warnings = diagnostics.length - errors;
  return `${lanes.length} lane(s), ${nodes.length} node(s), ${edges.length} edge(s); canvas ${canvas.width}x${canvas.height}; ${errors} error(s), ${warnings} warning(s)`;
}
