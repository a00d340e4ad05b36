import type { Category, CategoryStyle, LayoutConfig } from "../types.js";

export type NumericLayoutKey = Exclude<keyof LayoutConfig, "laneWidths">;

export const NUMERIC_LAYOUT_KEYS: readonly NumericLayoutKey[] = [
  "margin",
  "laneGap",
  "laneWidth",
  "lanePadding",
  "headerHeight",
  "nodeWidth",
  "nodeHeight",
  "nodeGap",
  "emptyLaneHeight",
];

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  margin: 40,
  laneGap: 40,
  laneWidth: 240,
  lanePadding: 20,
  headerHeight: 48,
  nodeWidth: 200,
  nodeHeight: 56,
  nodeGap: 16,
  emptyLaneHeight: 120,
};

export const CATEGORY_PALETTE: Record<Category, CategoryStyle> = {
  presentation: {
    fill: "DBEAFE",
    stroke: "1D4ED8",
    text: "1E3A8A",
  },
  application: {
    fill: "DCFCE7",
    stroke: "15803D",
    text: "14532D",
  },
  domain: {
    fill: "FEF3C7",
    stroke: "B45309",
    text: "78350F",
  },
  infrastructure: {
    fill: "EDE9FE",
    stroke: "6D28D9",
    text: "4C1D95",
  },
  state: {
    fill: "FCE7F3",
    stroke: "BE185D",
    text: "831843",
  },
  default: {
    fill: "F8FAFC",
    stroke: "0F172A",
    text: "0F172A",
  },
};

export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };
  for (const key of NUMERIC_LAYOUT_KEYS) {
    const value = overrides[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      config[key] = value;
    }
  }
  if (overrides.laneWidths) {
    config.laneWidths = { ...overrides.laneWidths };
  }
  return config;
}
