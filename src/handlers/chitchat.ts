/**
 * 闲聊：系统提示 + 历史 + 当前问题，直接流式转发
 */

import { assembleDialogue } from "../dialogue.js";
import type { ModelGateway } from "../llm/gateway.js";
import { HELP_DESK_SYSTEM_TURN } from "../prompts/index.js";
import type { Handler } from "./types.js";

export function createChitchatHandler(gateway: ModelGateway): Handler {
  return ({ question, history, signal }) =>
    gateway.stream(assembleDialogue(HELP_DESK_SYSTEM_TURN, history, question), { signal });
}
