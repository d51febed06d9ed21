/**
 * 意图模块入口
 */

export type { Classification, ClassifyOptions } from "./types.js";
export { ROUTES, OTHERS_INTENT, isIntentCode, intentLabel, type IntentCode } from "./routes.js";
export { classify, classifyIntent, parseIntentCode } from "./router.js";
