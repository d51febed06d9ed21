/**
 * LLM 工厂：任意 OpenAI 兼容接口（OpenAI / DeepSeek / Qwen / Ollama /v1）
 */

import { ChatOpenAI } from "@langchain/openai";
import type { LLMConfig, LLMProvider } from "../config.js";

/** 本地服务不校验 key，但 OpenAI 客户端要求 key 非空，以服务名占位 */
const KEYLESS_PROVIDERS: ReadonlySet<LLMProvider> = new Set<LLMProvider>(["ollama"]);

export function requiresApiKey(provider: LLMProvider): boolean {
  return !KEYLESS_PROVIDERS.has(provider);
}

function resolveApiKey(config: LLMConfig): string | undefined {
  if (config.apiKey) return config.apiKey;
  return requiresApiKey(config.provider) ? undefined : config.provider;
}

export function createLLM(config: LLMConfig): ChatOpenAI {
  return new ChatOpenAI({
    openAIApiKey: resolveApiKey(config),
    modelName: config.model,
    temperature: config.temperature ?? 0.7,
    maxTokens: config.maxTokens,
    streaming: true,
    // stream_options 只有 OpenAI 官方接口保证支持
    streamUsage: config.provider === "openai",
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}

export { createModelGateway, collectFragments, toLangChainMessages, type ModelGateway, type StreamOptions } from "./gateway.js";
