/**
 * 意图路由类型
 */

import type { ClassificationFallback } from "../config.js";
import type { Logger } from "../logger.js";
import type { IntentCode } from "./routes.js";

export interface ClassifyOptions {
  /** 分类输出无法解析时的策略，默认 others */
  onUnparseable?: ClassificationFallback;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Classification {
  intent: IntentCode;
  label: string;
  /** 模型原始输出（已拼接） */
  raw: string;
  /** 是否因无法解析而回落到「其他」 */
  fallback: boolean;
}
