/**
 * 意图分类：固定 few-shot 提示词，单次模型调用，完整收集输出后解析为 1-7
 * 分类输出不会转发给调用方
 */

import { ClassificationParseError } from "../errors.js";
import { collectFragments, type ModelGateway } from "../llm/gateway.js";
import { silentLogger } from "../logger.js";
import { ROUTER_PROMPT } from "../prompts/index.js";
import { OTHERS_INTENT, intentLabel, isIntentCode, type IntentCode } from "./routes.js";
import type { Classification, ClassifyOptions } from "./types.js";

const INTENT_DIGIT_REG = /^\+?0*(\d+)$/;

/** 解析单个十进制整数（允许前导 + 与 0），不在 1-7 内则抛 ClassificationParseError */
export function parseIntentCode(text: string): IntentCode {
  const m = text.trim().match(INTENT_DIGIT_REG);
  const n = m ? Number(m[1]) : NaN;
  if (!isIntentCode(n)) throw new ClassificationParseError(text);
  return n;
}

export async function classify(
  gateway: ModelGateway,
  question: string,
  options: ClassifyOptions = {}
): Promise<Classification> {
  const log = options.logger ?? silentLogger;
  const turns = ROUTER_PROMPT.render({ question });
  const raw = await collectFragments(gateway.stream(turns, { signal: options.signal }));

  try {
    const intent = parseIntentCode(raw);
    return { intent, label: intentLabel(intent), raw, fallback: false };
  } catch (e) {
    if (options.onUnparseable === "error") throw e;
    log.warn({ raw }, "意图分类结果无法解析，按「其他」处理");
    return { intent: OTHERS_INTENT, label: intentLabel(OTHERS_INTENT), raw, fallback: true };
  }
}

export async function classifyIntent(
  gateway: ModelGateway,
  question: string,
  options?: ClassifyOptions
): Promise<IntentCode> {
  return (await classify(gateway, question, options)).intent;
}
