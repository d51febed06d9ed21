import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { request as httpRequest } from "node:http";
import { setTimeout as sleep } from "node:timers/promises";
import request from "supertest";
import { FakeListChatModel } from "@langchain/core/utils/testing";
import { createApp } from "./app.js";
import type { ClassificationFallback } from "./config.js";
import { createDeploymentDispatcher } from "./handlers/dispatch.js";
import type { IntentCode } from "./intents/routes.js";
import { createModelGateway, type ModelGateway } from "./llm/gateway.js";
import { ScriptedGateway } from "./llm/scripted-gateway.js";
import { formatSseFrame } from "./sse.js";

interface Frame {
  event: string;
  data: unknown;
}

function parseFrames(body: string): Frame[] {
  return body
    .split("\n\n")
    .filter((block) => block.length > 0)
    .map((block) => {
      const [eventLine, dataLine] = block.split("\n");
      return {
        event: eventLine.slice("event: ".length),
        data: JSON.parse(dataLine.slice("data: ".length)),
      };
    });
}

function appFor(
  gateway: ModelGateway,
  servedIntents: IntentCode[],
  classificationFallback: ClassificationFallback = "others"
) {
  const dispatcher = createDeploymentDispatcher({ servedIntents }, { gateway, menu: "品項,價格\n經典牛肉堡,89" });
  return createApp({ gateway, dispatcher, classificationFallback });
}

const END = formatSseFrame("end", {});

async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`等待超时（${timeoutMs}ms）`);
    await sleep(10);
  }
}

describe("POST /chat", () => {
  it("rejects a shop question on a recommendation-only deployment", async () => {
    const gateway = createModelGateway(new FakeListChatModel({ responses: ["4"] }));
    const res = await request(appFor(gateway, [5]))
      .post("/chat")
      .send({ query: "台北車站附近的門市今天營業到幾點？", history: [] });
    assert.equal(res.status, 200);
    assert.equal(res.headers["content-type"], "text/event-stream");
    assert.equal(res.headers["cache-control"], "no-cache");
    assert.equal(
      res.text,
      formatSseFrame("data", { action: "response", message: "No response: 4 - Shop Query" }) + END
    );
  });

  it("streams a chitchat answer on an off-topic deployment", async () => {
    const answer = "我無法預測股市。";
    const gateway = createModelGateway(new FakeListChatModel({ responses: ["7", answer] }));
    const res = await request(appFor(gateway, [7]))
      .post("/chat")
      .send({ query: "你覺得最近股市會上漲嗎？", history: [] });
    const frames = parseFrames(res.text);
    const dataFrames = frames.filter((f) => f.event === "data");
    assert.equal(dataFrames.length, [...answer].length);
    assert.deepEqual(frames[frames.length - 1], { event: "end", data: {} });
    assert.equal(frames.filter((f) => f.event === "end").length, 1);
    const text = dataFrames
      .map((f) => {
        const payload = f.data;
        assert.ok(typeof payload === "object" && payload !== null && "message" in payload);
        return String(payload.message);
      })
      .join("");
    assert.equal(text, answer);
  });

  it("defaults a missing query and history", async () => {
    const gateway = new ScriptedGateway([["7"], ["嗨"]]);
    const res = await request(appFor(gateway, [7])).post("/chat").send({});
    assert.equal(res.text, formatSseFrame("data", { action: "response", message: "嗨" }) + END);
    const routerTurns = gateway.calls[0].turns;
    assert.deepEqual(routerTurns[routerTurns.length - 1], { role: "user", content: "" });
    assert.equal(gateway.calls[1].turns.length, 2);
  });

  it("forwards caller history to the chitchat call", async () => {
    const gateway = new ScriptedGateway([["7"], ["好"]]);
    await request(appFor(gateway, [7]))
      .post("/chat")
      .send({
        query: "那晚餐呢？",
        history: [
          { role: "user", content: "午餐吃什麼？" },
          { role: "assistant", content: "牛肉堡。" },
        ],
      });
    assert.deepEqual(
      gateway.calls[1].turns.slice(1),
      [
        { role: "user", content: "午餐吃什麼？" },
        { role: "assistant", content: "牛肉堡。" },
        { role: "user", content: "那晚餐呢？" },
      ]
    );
  });

  it("turns a mid-stream model failure into one error event before end", async () => {
    const gateway = new ScriptedGateway([["7"], { fragments: ["一", "二"], failWith: "模型中断" }]);
    const res = await request(appFor(gateway, [7])).post("/chat").send({ query: "嗨" });
    assert.equal(res.status, 200);
    assert.equal(
      res.text,
      formatSseFrame("data", { action: "response", message: "一" }) +
        formatSseFrame("data", { action: "response", message: "二" }) +
        formatSseFrame("error", { action: "error", message: "模型中断" }) +
        END
    );
    assert.equal(gateway.released, 2);
  });

  it("reports an unparseable classification in-band under the error policy", async () => {
    const gateway = new ScriptedGateway([["abc"]]);
    const res = await request(appFor(gateway, [7], "error")).post("/chat").send({ query: "嗨" });
    assert.equal(res.status, 200);
    assert.equal(
      res.text,
      formatSseFrame("error", { action: "error", message: '无法解析意图分类结果: "abc"' }) + END
    );
  });

  it("answers malformed JSON with a plain 500 and no frames", async () => {
    const gateway = new ScriptedGateway([]);
    const res = await request(appFor(gateway, [7]))
      .post("/chat")
      .set("Content-Type", "application/json")
      .send('{"query": ');
    assert.equal(res.status, 500);
    assert.match(res.headers["content-type"], /^application\/json/);
    assert.equal(typeof res.body.error, "string");
    assert.equal(res.text.includes("event:"), false);
    assert.equal(gateway.calls.length, 0);
  });

  it("rejects history entries with an unknown role before streaming", async () => {
    const gateway = new ScriptedGateway([]);
    const res = await request(appFor(gateway, [7]))
      .post("/chat")
      .send({ query: "嗨", history: [{ role: "robot", content: "beep" }] });
    assert.equal(res.status, 500);
    assert.match(res.body.error, /^请求体格式错误: history\.0\.role: /);
    assert.equal(gateway.calls.length, 0);
  });

  it("tags each response with a request id", async () => {
    const gateway = new ScriptedGateway([["7"], ["嗨"]]);
    const res = await request(appFor(gateway, [7])).post("/chat").send({ query: "嗨" });
    assert.match(res.headers["x-request-id"], /^req-\d+-/);
  });
});

describe("client disconnect", () => {
  it("aborts and releases the generation call when the client leaves after the first frame", async () => {
    const fragments = Array.from({ length: 200 }, (_, i) => `第${i}段`);
    const gateway = new ScriptedGateway([["7"], { fragments, delayMs: 20 }]);
    const server = appFor(gateway, [7]).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");

    try {
      const firstChunk = await new Promise<string>((resolve, reject) => {
        const req = httpRequest(
          {
            host: "127.0.0.1",
            port: address.port,
            path: "/chat",
            method: "POST",
            headers: { "Content-Type": "application/json" },
          },
          (res) => {
            // 主动断开后响应流会报 aborted
            res.on("error", () => undefined);
            res.once("data", (chunk: Buffer) => {
              req.destroy();
              resolve(chunk.toString("utf8"));
            });
          }
        );
        req.on("error", reject);
        req.end(JSON.stringify({ query: "嗨" }));
      });
      assert.ok(firstChunk.startsWith(formatSseFrame("data", { action: "response", message: "第0段" })));

      await waitFor(() => gateway.released === 2);
      assert.equal(gateway.calls.length, 2);
      assert.equal(gateway.calls[1].signal?.aborted, true);
    } finally {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

describe("cross-origin access", () => {
  it("reflects the caller origin and allows credentials", async () => {
    const res = await request(appFor(new ScriptedGateway([]), [7]))
      .get("/health")
      .set("Origin", "http://shop.example.test");
    assert.equal(res.status, 200);
    assert.deepEqual(res.body, { status: "ok" });
    assert.equal(res.headers["access-control-allow-origin"], "http://shop.example.test");
    assert.equal(res.headers["access-control-allow-credentials"], "true");
    assert.equal(res.headers["access-control-expose-headers"], "*");
  });
});
