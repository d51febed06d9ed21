/**
 * 意图处理器类型
 */

import type { DialogueHistory, OrderHistory } from "../types.js";

export interface HandlerRequest {
  question: string;
  history: DialogueHistory;
  orderHistory: OrderHistory;
  signal?: AbortSignal;
}

/** 处理器返回惰性片段序列，由调用方逐个拉取 */
export type Handler = (request: HandlerRequest) => AsyncIterable<string>;

export type HandlerKind = "chitchat" | "recommendation" | "menuQa";
