/**
 * 客服流式 HTTP 服务
 * POST /chat：请求体 { query, history }，响应为 SSE（event: data / error / end）
 * 请求体无法解析时在提交 SSE 响应头之前返回 500 JSON
 */

import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import { z } from "zod";
import { streamHelpDesk, type HelpDeskDeps } from "./agent.js";
import { RequestMalformedError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { relayToSse, SseWriter } from "./sse.js";
import { MESSAGE_ROLES, type ChatRequest } from "./types.js";

const chatRequestSchema = z.object({
  query: z.string().default(""),
  history: z
    .array(z.object({ role: z.enum(MESSAGE_ROLES), content: z.string() }))
    .default([]),
  orderHistory: z.array(z.array(z.string())).default([]),
});

export function parseChatRequest(body: unknown): ChatRequest {
  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new RequestMalformedError(`请求体格式错误: ${detail}`);
  }
  return parsed.data;
}

function generateId(): string {
  return `req-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

export interface AppDeps extends HelpDeskDeps {
  logger?: Logger;
}

export function createApp(deps: AppDeps): express.Express {
  const logger = deps.logger ?? silentLogger;
  const app = express();
  // 端点对所有来源开放
  app.use(cors({ origin: true, credentials: true, exposedHeaders: "*" }));
  app.use(express.json());

  app.post("/chat", async (req, res) => {
    const requestId = generateId();
    const log = logger.child({ requestId });
    res.setHeader("x-request-id", requestId);

    let chatRequest: ChatRequest;
    try {
      chatRequest = parseChatRequest(req.body);
    } catch (e) {
      log.warn({ err: e }, "请求体无效");
      res.status(500).json({ error: errorMessage(e) });
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await relayToSse(
        new SseWriter(res),
        streamHelpDesk(chatRequest, { ...deps, logger: log }, controller.signal),
        { signal: controller.signal, logger: log }
      );
      log.info(result, "对话结束");
    } catch (e) {
      log.error({ err: e }, "对话处理异常");
      if (!res.headersSent) {
        res.status(500).json({ error: errorMessage(e) });
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // JSON 解析失败等在路由之前抛出的错误，同样返回 500 JSON
  const handleError: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.warn({ err }, "请求处理失败");
    res.status(500).json({ error: errorMessage(err) });
  };
  app.use(handleError);

  return app;
}
