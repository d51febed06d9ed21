/**
 * 服务配置（环境变量）
 * 支持 .env / .env.local
 */

import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { isIntentCode, type IntentCode } from "./intents/routes.js";

dotenv.config();
dotenv.config({ path: ".env.local" });

const LLM_PROVIDERS = ["openai", "deepseek", "qwen", "ollama", "custom"] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ServerConfig {
  port: number;
  host: string;
}

/** 分类结果无法解析时的处理：others = 按「其他」处理，error = 让本次请求失败 */
export type ClassificationFallback = "others" | "error";

export interface DeploymentConfig {
  /** 本部署实际处理的意图，其余意图一律返回固定拒答 */
  servedIntents: IntentCode[];
  menuPath: string;
  classificationFallback: ClassificationFallback;
}

export interface LoggingConfig {
  level: string;
  pretty: boolean;
}

export interface AppConfig {
  llm: LLMConfig;
  server: ServerConfig;
  deployment: DeploymentConfig;
  logging: LoggingConfig;
}

type Env = Record<string, string | undefined>;

const PROVIDER_DEFAULTS: Record<LLMProvider, { model: string; baseUrl?: string }> = {
  openai: { model: "gpt-4o", baseUrl: "https://api.openai.com/v1" },
  deepseek: { model: "deepseek-chat", baseUrl: "https://api.deepseek.com" },
  qwen: { model: "qwen-plus", baseUrl: "https://dashscope.aliyuncs.com/compatible-mode/v1" },
  ollama: { model: "llama3", baseUrl: "http://localhost:11434/v1" },
  custom: { model: "gpt-3.5-turbo" },
};

function isProvider(value: string): value is LLMProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

function parseNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || Number.isNaN(n)) throw new ConfigError(`${name} 不是合法数字: ${raw}`);
  return n;
}

export function parseServedIntents(raw: string): IntentCode[] {
  const codes: IntentCode[] = [];
  for (const part of raw.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const n = Number(trimmed);
    if (!isIntentCode(n)) throw new ConfigError(`SERVED_INTENTS 含有非法意图编号: ${trimmed}`);
    if (!codes.includes(n)) codes.push(n);
  }
  return codes;
}

export function parseClassificationFallback(raw: string): ClassificationFallback {
  if (raw === "others" || raw === "error") return raw;
  throw new ConfigError(`CLASSIFICATION_FALLBACK 只能是 others 或 error: ${raw}`);
}

export function loadConfig(env: Env): AppConfig {
  const providerRaw = env.LLM_PROVIDER || "ollama";
  if (!isProvider(providerRaw)) throw new ConfigError(`未知的 LLM_PROVIDER: ${providerRaw}`);
  const provider = providerRaw;
  const d = PROVIDER_DEFAULTS[provider];

  return {
    llm: {
      provider,
      apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || "",
      baseUrl: env.LLM_BASE_URL || d.baseUrl,
      model: env.LLM_MODEL || d.model,
      temperature: parseNumber("LLM_TEMPERATURE", env.LLM_TEMPERATURE || "0.7"),
      maxTokens: parseNumber("LLM_MAX_TOKENS", env.LLM_MAX_TOKENS || "4096"),
    },
    server: {
      port: parseNumber("PORT", env.PORT || "8002"),
      host: env.HOST || "0.0.0.0",
    },
    deployment: {
      servedIntents: parseServedIntents(env.SERVED_INTENTS ?? "7"),
      menuPath: env.MENU_PATH || "data/menu.csv",
      classificationFallback: parseClassificationFallback(env.CLASSIFICATION_FALLBACK || "others"),
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      pretty: env.LOG_PRETTY === "true",
    },
  };
}

export function getConfig(): AppConfig {
  return loadConfig(process.env);
}
