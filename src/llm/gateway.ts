/**
 * 流式模型网关：提交有序对话，返回按序产出的文本片段
 * 每次 stream() 都是一次全新的模型调用；中途停止拉取会取消底层读取
 */

import {
  AIMessage,
  ChatMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
  type MessageContent,
} from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ModelStreamError, errorMessage } from "../errors.js";
import type { PromptSet, Turn } from "../types.js";

export interface StreamOptions {
  signal?: AbortSignal;
}

export interface ModelGateway {
  stream(turns: PromptSet, options?: StreamOptions): AsyncIterable<string>;
}

function toLangChainMessage(turn: Turn): BaseMessage {
  switch (turn.role) {
    case "system":
      return new SystemMessage(turn.content);
    case "user":
      return new HumanMessage(turn.content);
    case "assistant":
      return new AIMessage(turn.content);
    case "tool":
      return new ChatMessage(turn.content, "tool");
  }
}

export function toLangChainMessages(turns: PromptSet): BaseMessage[] {
  return turns.map(toLangChainMessage);
}

/** AIMessageChunk.content 可能是字符串或多段内容，只取文本段 */
export function contentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  let text = "";
  for (const part of content) {
    if (typeof part === "string") text += part;
    else if (part.type === "text" && typeof part.text === "string") text += part.text;
  }
  return text;
}

export function createModelGateway(model: BaseChatModel): ModelGateway {
  return {
    async *stream(turns, options = {}) {
      let stream: AsyncIterable<{ content: MessageContent }>;
      try {
        stream = await model.stream(toLangChainMessages(turns), { signal: options.signal });
      } catch (e) {
        throw new ModelStreamError(errorMessage(e), { cause: e });
      }
      try {
        for await (const chunk of stream) {
          const text = contentText(chunk.content);
          if (text) yield text;
        }
      } catch (e) {
        if (e instanceof ModelStreamError) throw e;
        throw new ModelStreamError(errorMessage(e), { cause: e });
      }
    },
  };
}

/** 完整消费片段序列并拼接；意图分类使用 */
export async function collectFragments(fragments: AsyncIterable<string>): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of fragments) chunks.push(chunk);
  return chunks.join("");
}
