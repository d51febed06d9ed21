/**
 * 客服核心：先做意图分类（完整收集，不转发），再交给对应处理器流式输出
 * 分类与生成是两次独立的模型调用，均不重试
 */

import type { ClassificationFallback } from "./config.js";
import type { Dispatcher } from "./handlers/dispatch.js";
import { classify } from "./intents/router.js";
import type { ModelGateway } from "./llm/gateway.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ChatRequest } from "./types.js";

export interface HelpDeskDeps {
  gateway: ModelGateway;
  dispatcher: Dispatcher;
  classificationFallback?: ClassificationFallback;
  logger?: Logger;
}

export async function* streamHelpDesk(
  request: ChatRequest,
  deps: HelpDeskDeps,
  signal?: AbortSignal
): AsyncGenerator<string> {
  const log = deps.logger ?? silentLogger;
  const started = Date.now();

  const classification = await classify(deps.gateway, request.query, {
    onUnparseable: deps.classificationFallback,
    signal,
    logger: log,
  });
  const served = deps.dispatcher.served.has(classification.intent);
  log.info(
    {
      intent: classification.intent,
      label: classification.label,
      fallback: classification.fallback,
      served,
      classifyMs: Date.now() - started,
    },
    "意图分类完成"
  );

  yield* deps.dispatcher.dispatch(classification.intent, {
    question: request.query,
    history: request.history,
    orderHistory: request.orderHistory,
    signal,
  });
}
