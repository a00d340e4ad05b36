import type { Category } from "../types.js";

export interface CategoryRule {
  category: Category;
  matches: (text: string) => boolean;
}

function containsKeyword(keyword: string): (text: string) => boolean {
  return (text) => text.toLowerCase().includes(keyword);
}

// Evaluated top to bottom; the first matching rule decides.
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "presentation", matches: containsKeyword("presentation") },
  { category: "application", matches: containsKeyword("application") },
  { category: "domain", matches: containsKeyword("domain") },
  { category: "infrastructure", matches: containsKeyword("infrastructure") },
  { category: "state", matches: containsKeyword("state") },
];

export function detectCategory(text: string): Category {
  for (const rule of CATEGORY_RULES) {
    if (rule.matches(text)) {
      return rule.category;
    }
  }
  return "default";
}
