import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createLLM, requiresApiKey } from "./index.js";

describe("createLLM", () => {
  it("fills a placeholder key for a local Ollama endpoint", () => {
    const llm = createLLM({ provider: "ollama", apiKey: "", model: "llama3", baseUrl: "http://localhost:11434/v1" });
    assert.equal(llm.openAIApiKey, "ollama");
    assert.equal(llm.modelName, "llama3");
    assert.equal(llm.streaming, true);
    assert.equal(llm.streamUsage, false);
  });

  it("keeps an explicit key and requests usage only from OpenAI", () => {
    const llm = createLLM({ provider: "openai", apiKey: "test-key", model: "gpt-4o", temperature: 0 });
    assert.equal(llm.openAIApiKey, "test-key");
    assert.equal(llm.temperature, 0);
    assert.equal(llm.streamUsage, true);
  });
});

describe("requiresApiKey", () => {
  it("exempts only keyless local providers", () => {
    assert.equal(requiresApiKey("ollama"), false);
    assert.equal(requiresApiKey("deepseek"), true);
    assert.equal(requiresApiKey("custom"), true);
  });
});
