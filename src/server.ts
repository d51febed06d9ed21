/**
 * 服务启动：读取配置，创建模型网关、菜单与意图分发，再监听端口
 */

import { createApp } from "./app.js";
import { getConfig } from "./config.js";
import { createDeploymentDispatcher, needsMenu } from "./handlers/dispatch.js";
import { intentLabel } from "./intents/routes.js";
import { createLLM, createModelGateway, requiresApiKey } from "./llm/index.js";
import { createLogger } from "./logger.js";
import { loadMenu } from "./menu.js";

const config = getConfig();
const logger = createLogger(config.logging);

const gateway = createModelGateway(createLLM(config.llm));
const { servedIntents, menuPath, classificationFallback } = config.deployment;
const dispatcher = createDeploymentDispatcher(config.deployment, {
  gateway,
  menu: needsMenu(servedIntents) ? loadMenu(menuPath) : undefined,
});

const app = createApp({ gateway, dispatcher, classificationFallback, logger });

app.listen(config.server.port, config.server.host, () => {
  logger.info(
    {
      provider: config.llm.provider,
      model: config.llm.model,
      servedIntents: servedIntents.map((code) => `${code} - ${intentLabel(code)}`),
      classificationFallback,
    },
    `Help desk server listening on http://${config.server.host}:${config.server.port}`
  );
  logger.info("POST /chat - 流式对话（SSE）");
  if (requiresApiKey(config.llm.provider) && !config.llm.apiKey) {
    logger.warn("未设置 LLM_API_KEY 或 OPENAI_API_KEY，调用 /chat 将可能报错，请配置后重启");
  }
});
