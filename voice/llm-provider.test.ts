/**
 * Tests for the language model provider factory and readiness checks.
 *
 * Run: npx tsx --test voice/llm-provider.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { loadConfig } from "./config.js";
import { createGeneratorForProvider, getLlmProviderStatus } from "./llm-provider.js";

test("OpenAI needs OPENAI_KEY", () => {
  const { llm } = loadConfig({ LLM_PROVIDER: "openai" });

  assert.deepEqual(getLlmProviderStatus(llm), {
    ready: false,
    reason: "missing_api_key",
    detail: "OPENAI_KEY is not set",
  });
});

test("Anthropic needs ANTHROPIC_API_KEY", () => {
  const { llm } = loadConfig({ LLM_PROVIDER: "anthropic" });

  assert.deepEqual(getLlmProviderStatus(llm), {
    ready: false,
    reason: "missing_api_key",
    detail: "ANTHROPIC_API_KEY is not set",
  });
});

test("a provider with its key is ready", () => {
  const { llm } = loadConfig({ LLM_PROVIDER: "anthropic", ANTHROPIC_API_KEY: "test-secret" });

  assert.deepEqual(getLlmProviderStatus(llm), { ready: true });
});

test("creates a generator without contacting the API", () => {
  const { llm } = loadConfig({ OPENAI_KEY: "test-secret" });

  assert.equal(typeof createGeneratorForProvider(llm).generate, "function");
});
