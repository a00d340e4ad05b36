import { DEFAULT_LAYOUT_CONFIG } from "./defaults.js";
import { computeCanvas, rightEdge } from "./geometry.js";
import type { Canvas, DiagramEdge, DiagramNode, Lane, LayoutConfig } from "../types.js";

export interface LayoutInput {
  lanes: Lane[];
  nodes: DiagramNode[];
  edges: DiagramEdge[];
}

function laneWidthFor(lane: Lane, config: LayoutConfig): number {
  const override = config.laneWidths?.[lane.key] ?? config.laneWidths?.[lane.id];
  return typeof override === "number" && Number.isFinite(override) && override >= 0 ? override : config.laneWidth;
}

function laneHeightFor(nodeCount: number, config: LayoutConfig): number {
  if (nodeCount === 0) {
    return config.emptyLaneHeight;
  }
  return config.headerHeight + nodeCount * (config.nodeHeight + config.nodeGap) + config.lanePadding * 2;
}

function stackStep(config: LayoutConfig): number {
  return config.nodeHeight + config.nodeGap;
}

function placeLanes(lanes: Lane[], nodeById: Map<string, DiagramNode>, config: LayoutConfig): void {
  let cursorX = config.margin;

  for (const lane of lanes) {
    lane.x = cursorX;
    lane.y = config.margin;
    lane.width = laneWidthFor(lane, config);
    lane.height = laneHeightFor(lane.nodeIds.length, config);

    const innerWidth = Math.max(0, Math.min(config.nodeWidth, lane.width - config.lanePadding * 2));
    const top = lane.y + config.headerHeight + config.lanePadding;

    lane.nodeIds.forEach((nodeId, index) => {
      const node = nodeById.get(nodeId);
      if (!node) {
        return;
      }
      node.x = lane.x + config.lanePadding;
      node.y = top + index * stackStep(config);
      node.width = innerWidth;
      node.height = config.nodeHeight;
    });

    cursorX = rightEdge(lane) + config.laneGap;
  }
}

function placeFreeNodes(lanes: Lane[], nodes: DiagramNode[], config: LayoutConfig): void {
  const lastLane = lanes[lanes.length - 1];
  const columnX = lastLane ? rightEdge(lastLane) + config.laneGap : config.margin;

  nodes
    .filter((node) => !node.laneId)
    .forEach((node, index) => {
      node.x = columnX;
      node.y = config.margin + index * stackStep(config);
      node.width = config.nodeWidth;
      node.height = config.nodeHeight;
    });
}

/**
 * Packs lanes left to right and stacks nodes top to bottom, writing position and
 * size onto every lane and node. Edges do not influence placement.
 */
export function layoutDiagram(diagram: LayoutInput, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): Canvas {
  const nodeById = new Map(diagram.nodes.map((node) => [node.id, node]));

  placeLanes(diagram.lanes, nodeById, config);
  placeFreeNodes(diagram.lanes, diagram.nodes, config);

  return computeCanvas(diagram.lanes, diagram.nodes, config);
}
