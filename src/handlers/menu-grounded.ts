/**
 * 基于菜单的闭卷处理器：推荐与商品问答
 * 提示词要求只使用菜单内已有的品项，资料不足时回复固定用语
 */

import type { ModelGateway } from "../llm/gateway.js";
import { DOCUMENT_QA_PROMPT, RECOMMENDATION_PROMPT } from "../prompts/index.js";
import type { OrderHistory } from "../types.js";
import type { Handler } from "./types.js";

export function formatOrderHistory(orderHistory: OrderHistory): string {
  return JSON.stringify(orderHistory);
}

export function createRecommendationHandler(gateway: ModelGateway, menu: string): Handler {
  return ({ question, orderHistory, signal }) => {
    const turns = RECOMMENDATION_PROMPT.render({
      question,
      menu,
      history: formatOrderHistory(orderHistory),
    });
    return gateway.stream(turns, { signal });
  };
}

export function createMenuQaHandler(gateway: ModelGateway, menu: string): Handler {
  return ({ question, signal }) =>
    gateway.stream(DOCUMENT_QA_PROMPT.render({ question, context: menu }), { signal });
}
