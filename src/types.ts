export type Category = "presentation" | "application" | "domain" | "infrastructure" | "state" | "default";

export interface DiagramNode {
  id: string;
  label: string;
  laneId?: string;
  laneKey?: string;
  category: Category;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Lane {
  id: string;
  key: string;
  label: string;
  category: Category;
  nodeIds: string[];
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DiagramEdge {
  from: string;
  to: string;
  label?: string;
}

export type DiagnosticKind =
  | "unparseable-line"
  | "dangling-edge"
  | "duplicate-node"
  | "nested-lane"
  | "duplicate-lane"
  | "unclosed-lane"
  | "stray-lane-close"
  | "ownership-conflict";

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  line: number;
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  message: string;
  text: string;
}

export interface ParsedDiagram {
  lanes: Lane[];
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  diagnostics: Diagnostic[];
}

export interface ParseOptions {
  strict?: boolean;
}

export interface LayoutConfig {
  margin: number;
  laneGap: number;
  laneWidth: number;
  lanePadding: number;
  headerHeight: number;
  nodeWidth: number;
  nodeHeight: number;
  nodeGap: number;
  emptyLaneHeight: number;
  laneWidths?: Record<string, number>;
}

export interface CategoryStyle {
  fill: string;
  stroke: string;
  text: string;
}

export interface Canvas {
  width: number;
  height: number;
}

export interface DiagramModel {
  meta: {
    source: string;
  };
  config: {
    layout: LayoutConfig;
    palette: Record<Category, CategoryStyle>;
  };
  lanes: Lane[];
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  canvas: Canvas;
}

export interface LanePatch {
  width?: number;
}

export interface LayoutPatch {
  layout?: Partial<Omit<LayoutConfig, "laneWidths">>;
  lanes?: Record<string, LanePatch>;
}

export interface BuildOptions extends ParseOptions {
  layout?: Partial<LayoutConfig>;
  patch?: LayoutPatch;
}
