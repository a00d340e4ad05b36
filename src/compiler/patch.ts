import { load as loadYaml } from "js-yaml";
import { NUMERIC_LAYOUT_KEYS, resolveLayoutConfig } from "./defaults.js";
import { PatchError } from "./errors.js";
import type { LanePatch, LayoutConfig, LayoutPatch } from "../types.js";

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function asDimension(input: unknown): number | undefined {
  return typeof input === "number" && Number.isFinite(input) && input >= 0 ? input : undefined;
}

function readLayoutSection(input: unknown): LayoutPatch["layout"] {
  if (!isRecord(input)) {
    return undefined;
  }

  const layout: NonNullable<LayoutPatch["layout"]> = {};
  for (const key of NUMERIC_LAYOUT_KEYS) {
    const value = asDimension(input[key]);
    if (value !== undefined) {
      layout[key] = value;
    }
  }
  return Object.keys(layout).length > 0 ? layout : undefined;
}

function readLanesSection(input: unknown): LayoutPatch["lanes"] {
  if (!isRecord(input)) {
    return undefined;
  }

  const lanes: Record<string, LanePatch> = {};
  for (const [laneId, lanePatch] of Object.entries(input)) {
    if (!isRecord(lanePatch)) {
      continue;
    }
    const width = asDimension(lanePatch.width);
    if (width !== undefined) {
      lanes[laneId] = { width };
    }
  }
  return Object.keys(lanes).length > 0 ? lanes : undefined;
}

export function parsePatchYaml(raw: string): LayoutPatch {
  let loaded: unknown;
  try {
    loaded = loadYaml(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatchError(`Invalid layout patch: ${reason}`, { cause: error });
  }

  if (!isRecord(loaded)) {
    return {};
  }

  const patch: LayoutPatch = {};
  const layout = readLayoutSection(loaded.layout);
  if (layout) {
    patch.layout = layout;
  }
  const lanes = readLanesSection(loaded.lanes);
  if (lanes) {
    patch.lanes = lanes;
  }
  return patch;
}

export function applyLayoutPatch(config: LayoutConfig, patch?: LayoutPatch): LayoutConfig {
  if (!patch) {
    return resolveLayoutConfig(config);
  }

  const next = resolveLayoutConfig({ ...config, ...patch.layout });
  if (patch.lanes) {
    const laneWidths: Record<string, number> = { ...config.laneWidths };
    for (const [laneId, lanePatch] of Object.entries(patch.lanes)) {
      const width = asDimension(lanePatch.width);
      if (width !== undefined) {
        laneWidths[laneId] = width;
      }
    }
    next.laneWidths = laneWidths;
  }
  return next;
}
