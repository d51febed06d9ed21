import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { FakeListChatModel } from "@langchain/core/utils/testing";
import { ClassificationParseError } from "../errors.js";
import { createModelGateway } from "../llm/gateway.js";
import { ScriptedGateway } from "../llm/scripted-gateway.js";
import { ROUTER_EXAMPLES } from "../prompts/index.js";
import { ROUTES, intentLabel, isIntentCode } from "./routes.js";
import { classify, classifyIntent, parseIntentCode } from "./router.js";

describe("parseIntentCode", () => {
  it("accepts a single integer in range", () => {
    assert.equal(parseIntentCode("7"), 7);
    assert.equal(parseIntentCode(" 3\n"), 3);
    assert.equal(parseIntentCode("+4"), 4);
    assert.equal(parseIntentCode("05"), 5);
  });

  for (const bad of ["0", "8", "12", "2.", "abc", "", "1 2"]) {
    it(`rejects ${JSON.stringify(bad)}`, () => {
      assert.throws(() => parseIntentCode(bad), ClassificationParseError);
    });
  }
});

describe("classifyIntent", () => {
  it("returns the labelled code for a few-shot example", async () => {
    const gateway = createModelGateway(new FakeListChatModel({ responses: ["2"] }));
    assert.equal(await classifyIntent(gateway, "小杯可樂現在多少錢？"), 2);
  });

  it("submits the system instruction, seven example pairs and the question", async () => {
    const gateway = new ScriptedGateway([["4"]]);
    await classifyIntent(gateway, "台北車站附近的門市今天營業到幾點？");
    const turns = gateway.calls[0].turns;
    assert.equal(turns.length, 16);
    assert.equal(turns[0].role, "system");
    assert.deepEqual(turns[3], { role: "user", content: ROUTER_EXAMPLES[1] });
    assert.deepEqual(turns[4], { role: "assistant", content: "2" });
    assert.deepEqual(turns[15], { role: "user", content: "台北車站附近的門市今天營業到幾點？" });
  });

  it("drains and concatenates every fragment before parsing", async () => {
    const gateway = new ScriptedGateway([[" ", "5", "\n"]]);
    assert.equal(await classifyIntent(gateway, "有沒有推薦？"), 5);
    assert.equal(gateway.released, 1);
  });

  it("falls back to Others on unparseable output by default", async () => {
    const gateway = new ScriptedGateway([["I think 4"]]);
    const result = await classify(gateway, "?");
    assert.deepEqual(result, { intent: 7, label: "Others", raw: "I think 4", fallback: true });
  });

  it("fails when the policy is error", async () => {
    const gateway = new ScriptedGateway([["nine"]]);
    await assert.rejects(classify(gateway, "?", { onUnparseable: "error" }), ClassificationParseError);
  });

  it("propagates model failures without retrying", async () => {
    const gateway = new ScriptedGateway([{ fragments: [], failWith: "model down" }]);
    await assert.rejects(classify(gateway, "?"), /model down/);
    assert.equal(gateway.calls.length, 1);
  });
});

describe("ROUTES", () => {
  it("is a frozen table of seven labels", () => {
    assert.equal(Object.isFrozen(ROUTES), true);
    assert.equal(Object.keys(ROUTES).length, 7);
    assert.equal(intentLabel(4), "Shop Query");
    assert.equal(isIntentCode(0), false);
    assert.equal(isIntentCode(5.5), false);
  });
});
