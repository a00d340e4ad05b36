import type { Diagnostic } from "../types.js";

export class DiagramParseError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const first = diagnostics[0];
    const summary = first ? `; first at line ${first.line}: ${first.message}` : "";
    super(`Diagram source has ${diagnostics.length} problem(s)${summary}`);
    this.name = "DiagramParseError";
    this.diagnostics = diagnostics;
  }
}

export class PatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PatchError";
  }
}
