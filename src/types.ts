/**
 * 客服服务端类型
 */

export const MESSAGE_ROLES = ["system", "user", "assistant", "tool"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** 单条对话；创建后冻结，content 在渲染前可包含 {name} 占位符 */
export interface Turn {
  readonly role: MessageRole;
  readonly content: string;
}

/** 一次提交给模型的有序对话集合，顺序即语义 */
export type PromptSet = readonly Turn[];

/** 模板变量：占位符名 → 值（渲染时统一转为字符串） */
export type TemplateInput = Readonly<Record<string, string | number | boolean>>;

/** 调用方每次请求自带的历史对话，不在服务端保存 */
export type DialogueHistory = readonly Turn[];

/** 用户过往点餐记录：每一餐是一组菜名 */
export type OrderHistory = readonly (readonly string[])[];

export interface ChatRequest {
  query: string;
  history: DialogueHistory;
  orderHistory: OrderHistory;
}

export type SseEventName = "data" | "error" | "end";

export interface SseResponsePayload {
  action: "response";
  message: string;
}

export interface SseErrorPayload {
  action: "error";
  message: string;
}

export type SseEndPayload = Record<string, never>;
