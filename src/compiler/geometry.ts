import type { Canvas, DiagramNode, Lane, LayoutConfig } from "../types.js";

type Box = Pick<Lane | DiagramNode, "x" | "y" | "width" | "height">;

export function rightEdge(box: Box): number {
  return box.x + box.width;
}

export function bottomEdge(box: Box): number {
  return box.y + box.height;
}

export function computeCanvas(lanes: Lane[], nodes: DiagramNode[], config: Pick<LayoutConfig, "margin">): Canvas {
  let maxX = config.margin;
  let maxY = config.margin;

  for (const box of [...lanes, ...nodes]) {
    maxX = Math.max(maxX, rightEdge(box));
    maxY = Math.max(maxY, bottomEdge(box));
  }

  return {
    width: maxX + config.margin,
    height: maxY + config.margin,
  };
}

export function contains(outer: Box, inner: Box): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    rightEdge(inner) <= rightEdge(outer) &&
    bottomEdge(inner) <= bottomEdge(outer)
  );
}
