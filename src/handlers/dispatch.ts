/**
 * 意图分发：意图编号 → 处理器
 * 哪些意图被实际处理由部署配置决定，未处理的意图返回固定拒答
 */

import type { DeploymentConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { intentLabel, type IntentCode } from "../intents/routes.js";
import type { ModelGateway } from "../llm/gateway.js";
import { createChitchatHandler } from "./chitchat.js";
import { createMenuQaHandler, createRecommendationHandler } from "./menu-grounded.js";
import type { Handler, HandlerKind, HandlerRequest } from "./types.js";

export interface Dispatcher {
  readonly served: ReadonlySet<IntentCode>;
  dispatch(intent: IntentCode, request: HandlerRequest): AsyncIterable<string>;
}

/** 内置处理器对应的意图 */
export const HANDLER_FOR_INTENT: Readonly<Partial<Record<IntentCode, HandlerKind>>> = Object.freeze({
  2: "menuQa",
  5: "recommendation",
  7: "chitchat",
});

export function rejectionMessage(intent: IntentCode): string {
  return `No response: ${intent} - ${intentLabel(intent)}`;
}

export async function* rejectionFragments(intent: IntentCode): AsyncGenerator<string> {
  yield rejectionMessage(intent);
}

export function createDispatcher(handlers: ReadonlyMap<IntentCode, Handler>): Dispatcher {
  const table = new Map(handlers);
  return {
    served: new Set(table.keys()),
    dispatch(intent, request) {
      const handler = table.get(intent);
      return handler ? handler(request) : rejectionFragments(intent);
    },
  };
}

export interface DeploymentResources {
  gateway: ModelGateway;
  /** 菜单原文；部署包含菜单类意图时必填 */
  menu?: string;
}

export function needsMenu(servedIntents: readonly IntentCode[]): boolean {
  return servedIntents.some((code) => {
    const kind = HANDLER_FOR_INTENT[code];
    return kind === "recommendation" || kind === "menuQa";
  });
}

function buildHandler(kind: HandlerKind, resources: DeploymentResources): Handler {
  if (kind === "chitchat") return createChitchatHandler(resources.gateway);
  if (resources.menu === undefined) throw new ConfigError(`处理器 ${kind} 需要菜单内容`);
  return kind === "recommendation"
    ? createRecommendationHandler(resources.gateway, resources.menu)
    : createMenuQaHandler(resources.gateway, resources.menu);
}

export function createDeploymentDispatcher(
  deployment: Pick<DeploymentConfig, "servedIntents">,
  resources: DeploymentResources
): Dispatcher {
  const handlers = new Map<IntentCode, Handler>();
  for (const code of deployment.servedIntents) {
    const kind = HANDLER_FOR_INTENT[code];
    if (!kind) throw new ConfigError(`意图 ${code} - ${intentLabel(code)} 没有可用的处理器`);
    handlers.set(code, buildHandler(kind, resources));
  }
  return createDispatcher(handlers);
}
