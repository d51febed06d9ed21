/**
 * 提示词模板渲染
 * 占位符写作 {name}，name 为花括号内任意非空文本；{{ 与 }} 表示字面量花括号
 */

import { InvalidRoleError, MissingVariableError } from "../errors.js";
import { MESSAGE_ROLES, type MessageRole, type PromptSet, type TemplateInput, type Turn } from "../types.js";

const TOKEN_REG = /\{\{|\}\}|\{([^{}]+)\}/g;

export function isMessageRole(value: unknown): value is MessageRole {
  return typeof value === "string" && (MESSAGE_ROLES as readonly string[]).includes(value);
}

/** 创建一条对话；角色不在 system/user/assistant/tool 内时抛 InvalidRoleError */
export function createTurn(role: string, content: string): Turn {
  if (!isMessageRole(role)) throw new InvalidRoleError(role);
  return Object.freeze({ role, content });
}

export function extractPlaceholders(content: string): Set<string> {
  const names = new Set<string>();
  for (const m of content.matchAll(TOKEN_REG)) {
    if (m[1] !== undefined) names.add(m[1]);
  }
  return names;
}

function substitute(content: string, vars: TemplateInput): string {
  return content.replace(TOKEN_REG, (token: string, name: string | undefined) => {
    if (name === undefined) return token === "{{" ? "{" : "}";
    return String(vars[name]);
  });
}

/**
 * 渲染整组对话：先校验全部占位符，再逐条替换
 * 返回新数组，不修改、不重排入参
 */
export function render(turns: PromptSet, vars: TemplateInput): PromptSet {
  const missing: string[] = [];
  for (const turn of turns) {
    for (const name of extractPlaceholders(turn.content)) {
      if (!Object.hasOwn(vars, name) && !missing.includes(name)) missing.push(name);
    }
  }
  if (missing.length) throw new MissingVariableError(missing);

  return Object.freeze(turns.map((turn) => createTurn(turn.role, substitute(turn.content, vars))));
}

export interface PromptTemplate {
  readonly turns: PromptSet;
  /** 模板声明的全部占位符 */
  readonly placeholders: ReadonlySet<string>;
  render(vars: TemplateInput): PromptSet;
}

/** 预先计算占位符集合的模板，调用时按集合校验 */
export function definePromptTemplate(turns: ReadonlyArray<readonly [string, string]>): PromptTemplate {
  const frozen: PromptSet = Object.freeze(turns.map(([role, content]) => createTurn(role, content)));
  const placeholders = new Set<string>();
  for (const turn of frozen) {
    for (const name of extractPlaceholders(turn.content)) placeholders.add(name);
  }
  return {
    turns: frozen,
    placeholders,
    render: (vars) => render(frozen, vars),
  };
}
