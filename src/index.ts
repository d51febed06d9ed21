/**
 * npm 包入口：供外部组装客服流水线
 */

export { createApp, parseChatRequest, type AppDeps } from "./app.js";
export { streamHelpDesk, type HelpDeskDeps } from "./agent.js";
export { assembleDialogue } from "./dialogue.js";
export { getConfig, loadConfig, type AppConfig, type DeploymentConfig, type LLMConfig } from "./config.js";
export * from "./errors.js";
export * from "./handlers/index.js";
export * from "./intents/index.js";
export { createLLM, createModelGateway, collectFragments, requiresApiKey, toLangChainMessages } from "./llm/index.js";
export type { ModelGateway, StreamOptions } from "./llm/index.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { loadMenu, clearMenuCache } from "./menu.js";
export * from "./prompts/index.js";
export { formatSseFrame, relayToSse, SseWriter, type RelayResult, type SseState, type SseTarget } from "./sse.js";
export type {
  ChatRequest,
  DialogueHistory,
  MessageRole,
  OrderHistory,
  PromptSet,
  TemplateInput,
  Turn,
} from "./types.js";
