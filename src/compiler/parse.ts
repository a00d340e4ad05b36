import { detectCategory } from "./category.js";
import { DiagramParseError } from "./errors.js";
import type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
  DiagramEdge,
  DiagramNode,
  Lane,
  ParseOptions,
  ParsedDiagram,
} from "../types.js";

export type LineKind =
  | { kind: "blank" }
  | { kind: "comment" }
  | { kind: "header" }
  | { kind: "laneClose" }
  | { kind: "laneOpen"; id: string; label: string }
  | { kind: "style"; id: string; fill: string }
  | { kind: "node"; id: string; label: string }
  | { kind: "edge"; from: string; to: string; label?: string }
  | { kind: "unknown" };

type LineMatcher = (line: string) => LineKind | null;

const ID = "[A-Za-z0-9_-]+";
const HEADER_RE = /^(flowchart|graph)\b(?:\s+[A-Za-z]{2})?\s*;?$/iu;
const LANE_OPEN_RE = new RegExp(`^subgraph\\s+(${ID})(.*)$`, "iu");
const LANE_LABEL_RE = /"([^"]*)"|'([^']*)'|\[([^\]]*)\]/u;
const STYLE_RE = new RegExp(`^style\\s+(${ID})\\s+fill:\\s*(#?[0-9A-Fa-f]{3,8})(?:[,;\\s].*)?$`, "iu");
const NODE_RE = new RegExp(`^(${ID})\\s*\\[("[^"]*"|'[^']*'|[^\\[\\]]*)\\]\\s*;?$`, "u");
const LABELED_EDGE_RE = new RegExp(`^(${ID})\\s*-->\\s*\\|([^|]*)\\|\\s*(${ID})\\s*;?$`, "u");
const EDGE_RE = new RegExp(`^(${ID})\\s*-->\\s*(${ID})\\s*;?$`, "u");
const BREAK_RE = /<br\s*\/?>/giu;
const MARKUP_RE = /<\/?(?:b|i|u|s|em|strong|span|small|big|sub|sup|code|mark|font)(?:\s+[^<>]*)?\s*\/?>/giu;

// Only unrecognized lines and dropped edges lose input; the rest is resolved by rule.
export const DIAGNOSTIC_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  "unparseable-line": "error",
  "dangling-edge": "error",
  "duplicate-node": "warning",
  "nested-lane": "warning",
  "duplicate-lane": "warning",
  "unclosed-lane": "warning",
  "stray-lane-close": "warning",
  "ownership-conflict": "warning",
};

export function isErrorDiagnostic(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

function cleanLabel(raw: string): string {
  let next = raw.trim();
  const quoted = next.match(/^(["'])([\s\S]*)\1$/u);
  next = quoted ? quoted[2] : next;

  next = next.replace(BREAK_RE, "\n").replace(MARKUP_RE, "");

  return next
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
}

function matchLaneOpen(line: string): LineKind | null {
  const matched = line.match(LANE_OPEN_RE);
  if (!matched) {
    return null;
  }

  const id = matched[1];
  const run = matched[2].match(LANE_LABEL_RE);
  const label = run ? cleanLabel(run[1] ?? run[2] ?? run[3] ?? "") : "";
  return { kind: "laneOpen", id, label: label || id };
}

function matchEdge(line: string): LineKind | null {
  const labeled = line.match(LABELED_EDGE_RE);
  if (labeled) {
    const label = cleanLabel(labeled[2]);
    return label ? { kind: "edge", from: labeled[1], to: labeled[3], label } : { kind: "edge", from: labeled[1], to: labeled[3] };
  }

  const plain = line.match(EDGE_RE);
  if (plain) {
    return { kind: "edge", from: plain[1], to: plain[2] };
  }
  return null;
}

// First matcher that accepts the line wins.
const LINE_MATCHERS: readonly LineMatcher[] = [
  (line) => (line === "" ? { kind: "blank" } : null),
  (line) => (line.startsWith("%%") ? { kind: "comment" } : null),
  (line) => (HEADER_RE.test(line) ? { kind: "header" } : null),
  (line) => (/^end\s*;?$/u.test(line) ? { kind: "laneClose" } : null),
  matchLaneOpen,
  (line) => {
    const matched = line.match(STYLE_RE);
    return matched ? { kind: "style", id: matched[1], fill: matched[2] } : null;
  },
  (line) => {
    const matched = line.match(NODE_RE);
    if (!matched) {
      return null;
    }
    return { kind: "node", id: matched[1], label: cleanLabel(matched[2]) || matched[1] };
  },
  matchEdge,
];

export function classifyLine(raw: string): LineKind {
  const line = raw.trim();
  for (const matcher of LINE_MATCHERS) {
    const parsed = matcher(line);
    if (parsed) {
      return parsed;
    }
  }
  return { kind: "unknown" };
}

interface LaneContext {
  lane: Lane;
  line: number;
}

export function parseDiagram(source: string, options: ParseOptions = {}): ParsedDiagram {
  const lines = source.replace(/\r\n/g, "\n").split("\n");

  const lanes: Lane[] = [];
  const laneCountById = new Map<string, number>();
  const nodes: DiagramNode[] = [];
  const nodeById = new Map<string, DiagramNode>();
  const edges: DiagramEdge[] = [];
  const diagnostics: Diagnostic[] = [];

  let context: LaneContext | undefined;

  for (let index = 0; index < lines.length; index += 1) {
    const lineNumber = index + 1;
    const text = lines[index].trim();
    const report = (kind: DiagnosticKind, message: string): void => {
      diagnostics.push({ line: lineNumber, kind, severity: DIAGNOSTIC_SEVERITY[kind], message, text });
    };

    const parsed = classifyLine(text);
    switch (parsed.kind) {
      case "blank":
      case "comment":
      case "header":
        break;

      case "style":
        // Reserved hook: recognized so it is not reported, applies nothing.
        break;

      case "laneClose":
        if (!context) {
          report("stray-lane-close", `"${text}" without an open lane`);
        }
        context = undefined;
        break;

      case "laneOpen": {
        if (context) {
          report("nested-lane", `Lane ${parsed.id} opened before lane ${context.lane.key} was closed`);
        }

        const count = (laneCountById.get(parsed.id) ?? 0) + 1;
        laneCountById.set(parsed.id, count);
        const key = count === 1 ? parsed.id : `${parsed.id}#${count}`;
        if (count > 1) {
          report("duplicate-lane", `Lane ${parsed.id} declared again; opened as separate lane ${key}`);
        }

        const lane: Lane = {
          id: parsed.id,
          key,
          label: parsed.label,
          category: detectCategory(parsed.label),
          nodeIds: [],
          x: 0,
          y: 0,
          width: 0,
          height: 0,
        };
        lanes.push(lane);
        context = { lane, line: lineNumber };
        break;
      }

      case "node": {
        const lane = context?.lane;
        const existing = nodeById.get(parsed.id);
        if (existing) {
          report("duplicate-node", `Node ${parsed.id} redeclared; label replaced`);
          existing.label = parsed.label;

          if (!existing.laneKey && lane) {
            existing.laneId = lane.id;
            existing.laneKey = lane.key;
            existing.category = lane.category;
            lane.nodeIds.push(existing.id);
          } else if (existing.laneKey && lane && existing.laneKey !== lane.key) {
            report("ownership-conflict", `Node ${parsed.id} already belongs to lane ${existing.laneKey}`);
          }
          break;
        }

        const node: DiagramNode = {
          id: parsed.id,
          label: parsed.label,
          category: lane?.category ?? "default",
          x: 0,
          y: 0,
          width: 0,
          height: 0,
        };
        if (lane) {
          node.laneId = lane.id;
          node.laneKey = lane.key;
          lane.nodeIds.push(node.id);
        }
        nodes.push(node);
        nodeById.set(node.id, node);
        break;
      }

      case "edge": {
        const missing = [parsed.from, parsed.to].filter((id) => !nodeById.has(id));
        if (missing.length > 0) {
          report("dangling-edge", `Edge ${parsed.from} --> ${parsed.to} references undeclared node ${missing.join(", ")}`);
          break;
        }
        edges.push(parsed.label ? { from: parsed.from, to: parsed.to, label: parsed.label } : { from: parsed.from, to: parsed.to });
        break;
      }

      case "unknown":
        report("unparseable-line", "Unrecognized line");
        break;
    }
  }

  if (context) {
    const { line, lane } = context;
    diagnostics.push({
      line,
      kind: "unclosed-lane",
      severity: DIAGNOSTIC_SEVERITY["unclosed-lane"],
      message: `Lane ${lane.key} is never closed`,
      text: lines[line - 1].trim(),
    });
  }

  const errors = diagnostics.filter(isErrorDiagnostic);
  if (options.strict && errors.length > 0) {
    throw new DiagramParseError(errors);
  }

  return {
    lanes,
    nodes,
    edges,
    diagnostics,
  };
}
