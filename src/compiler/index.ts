import { CATEGORY_PALETTE, resolveLayoutConfig } from "./defaults.js";
import { layoutDiagram } from "./layout.js";
import { parseDiagram } from "./parse.js";
import { applyLayoutPatch } from "./patch.js";
import type { BuildOptions, Diagnostic, DiagramModel } from "../types.js";

export interface CompileResult {
  model: DiagramModel;
  diagnostics: Diagnostic[];
}

export function compileDiagram(source: string, options: BuildOptions = {}): CompileResult {
  const parsed = parseDiagram(source, { strict: options.strict });
  const layout = applyLayoutPatch(resolveLayoutConfig(options.layout), options.patch);
  const canvas = layoutDiagram(parsed, layout);

  return {
    model: {
      meta: {
        source,
      },
      config: {
        layout,
        palette: { ...CATEGORY_PALETTE },
      },
      lanes: parsed.lanes,
      nodes: parsed.nodes,
      edges: parsed.edges,
      canvas,
    },
    diagnostics: parsed.diagnostics,
  };
}

export function compileToModel(source: string, options: BuildOptions = {}): DiagramModel {
  return compileDiagram(source, options).model;
}
