/**
 * 结构化日志（pino）
 * LOG_PRETTY=true 时输出彩色可读格式，否则为 JSON 行
 */

import { pino, type Logger, type LoggerOptions } from "pino";
import { build as prettyStream } from "pino-pretty";
import type { LoggingConfig } from "./config.js";

export type { Logger };

export function createLogger(config: LoggingConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    redact: {
      paths: ["apiKey", "*.apiKey", "llm.apiKey", "req.headers.authorization"],
      censor: "[REDACTED]",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (!config.pretty) return pino(options);
  return pino(
    options,
    prettyStream({
      colorize: true,
      translateTime: "SYS:HH:MM:ss",
      ignore: "pid,hostname",
    })
  );
}

/** 测试与库调用方未注入 logger 时使用的静默实例 */
export const silentLogger: Logger = pino({ level: "silent" });
