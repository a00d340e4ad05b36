export { compileDiagram, compileToModel } from "./compiler/index.js";
export type { CompileResult } from "./compiler/index.js";
export { parseDiagram, classifyLine, isErrorDiagnostic, DIAGNOSTIC_SEVERITY } from "./compiler/parse.js";
export type { LineKind } from "./compiler/parse.js";
export { CATEGORY_RULES, detectCategory } from "./compiler/category.js";
export { layoutDiagram } from "./compiler/layout.js";
export type { LayoutInput } from "./compiler/layout.js";
export { computeCanvas } from "./compiler/geometry.js";
export { parsePatchYaml, applyLayoutPatch } from "./compiler/patch.js";
export { CATEGORY_PALETTE, DEFAULT_LAYOUT_CONFIG, resolveLayoutConfig } from "./compiler/defaults.js";
export { DiagramParseError, PatchError } from "./compiler/errors.js";
export { formatDiagnostic, formatSummary } from "./report.js";
export type * from "./types.js";
