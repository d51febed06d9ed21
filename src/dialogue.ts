/**
 * 对话组装：[system] + 历史 + 当前问题
 */

import { createTurn, render } from "./prompts/template.js";
import type { DialogueHistory, PromptSet, Turn } from "./types.js";

const QUESTION_TURN = createTurn("user", "{question}");

/**
 * 问题以 {question} 模板插入并且只渲染这一条，
 * 历史内容原样透传，不会被当作模板解析
 */
export function assembleDialogue(system: Turn, history: DialogueHistory, question: string): PromptSet {
  const [questionTurn] = render([QUESTION_TURN], { question });
  return Object.freeze([system, ...history.map((t) => createTurn(t.role, t.content)), questionTurn]);
}
