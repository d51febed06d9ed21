/**
 * 意图编号与名称对照表（进程级常量，只读）
 */

export type IntentCode = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const ROUTES: Readonly<Record<IntentCode, string>> = Object.freeze({
  1: "Food Ordering",
  2: "Product Query",
  3: "Event Query",
  4: "Shop Query",
  5: "Product Recommendation",
  6: "Corporate Information",
  7: "Others",
});

export const OTHERS_INTENT: IntentCode = 7;

export function isIntentCode(value: unknown): value is IntentCode {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 7;
}

export function intentLabel(code: IntentCode): string {
  return ROUTES[code];
}
