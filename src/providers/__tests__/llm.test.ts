import assert from "node:assert/strict";
import { test } from "node:test";
import { makeConfig } from "../../__tests__/fixtures.js";
import type { SecReviewConfig } from "../../config/loadConfig.js";
import {
  LlmMissingApiKeyError,
  LlmResponseMissingContentError,
  ProviderApiResponseError,
  ProviderRequestFailedError
} from "../../errors/provider.errors.js";
import type { Logger } from "../../logging/logger.js";
import { noopLogger } from "../../logging/logger.js";
import type { SdkAdapterOptions } from "../../services/llm/adapter.js";
import type { ChatMessage, FetchFn } from "../llm.js";
import { buildOllamaPrompt, extractCompletionText, runChatCompletion } from "../llm.js";

const MESSAGES: ChatMessage[] = [
  { role: "system", content: "Respond with JSON." },
  { role: "user", content: "Analyze this." }
];

type Recorded = { url: string; body: Record<string, unknown> };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });

const recordingFetch = (responses: Array<Response | Error>) => {
  const calls: Recorded[] = [];
  const fetch: FetchFn = async (url, init) => {
    const raw = typeof init.body === "string" ? init.body : "{}";
    const body: unknown = JSON.parse(raw);
    calls.push({ url, body: isRecord(body) ? body : {} });
    const next = responses.shift();
    if (!next) throw new Error("unexpected request");
    if (next instanceof Error) throw next;
    return next;
  };
  return { calls, fetch };
};

const noSleep = async () => {};

const withLlm = (patch: Partial<SecReviewConfig["llm"]>): SecReviewConfig => {
  const config = makeConfig("/work");
  return { ...config, llm: { ...config.llm, ...patch } };
};

test("lmstudio: first request omits the model", async () => {
  const { calls, fetch } = recordingFetch([jsonResponse({ choices: [{ message: { content: "{\"ok\": true}" } }] })]);

  const text = await runChatCompletion(withLlm({}), MESSAGES, { fetch, sleep: noSleep });

  assert.equal(text, "{\"ok\": true}");
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, "http://localhost:1234/v1/chat/completions");
  assert.equal("model" in (calls[0]?.body ?? {}), false);
  assert.deepEqual(calls[0]?.body.messages, MESSAGES);
  assert.equal(calls[0]?.body.max_tokens, 2000);
});

test("lmstudio: a rejected request is retried once with the model", async () => {
  const { calls, fetch } = recordingFetch([
    jsonResponse({ error: "model is required" }, 400),
    jsonResponse({ choices: [{ text: "plain completion" }] })
  ]);

  const text = await runChatCompletion(withLlm({ model: "qwen2.5-coder" }), MESSAGES, { fetch, sleep: noSleep });

  assert.equal(text, "plain completion");
  assert.equal(calls.length, 2);
  assert.equal(calls[1]?.body.model, "qwen2.5-coder");
});

test("lmstudio: error bodies surface as ProviderApiResponseError", async () => {
  const { fetch } = recordingFetch([
    jsonResponse({ error: { message: "no model loaded" } }, 404),
    jsonResponse({ error: { message: "no model loaded" } }, 404)
  ]);

  await assert.rejects(
    () => runChatCompletion(withLlm({}), MESSAGES, { fetch, sleep: noSleep }),
    (err: unknown) =>
      err instanceof ProviderApiResponseError &&
      err.status === 404 &&
      err.message === "LLM request failed with status 404: no model loaded"
  );
});

test("retryable statuses back off and retry", async () => {
  const delays: number[] = [];
  const { calls, fetch } = recordingFetch([
    new Response("busy", { status: 503, headers: { "retry-after": "2" } }),
    jsonResponse({ content: "after retry" })
  ]);

  const text = await runChatCompletion(withLlm({}), MESSAGES, {
    fetch,
    sleep: async (ms) => {
      delays.push(ms);
    }
  });

  assert.equal(text, "after retry");
  assert.equal(calls.length, 2);
  assert.deepEqual(delays, [2000]);
});

test("network failures become ProviderRequestFailedError after bounded attempts", async () => {
  const refused = new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:1234") });
  const { calls, fetch } = recordingFetch([refused, refused, refused]);

  await assert.rejects(
    () => runChatCompletion(withLlm({}), MESSAGES, { fetch, sleep: noSleep }),
    (err: unknown) =>
      err instanceof ProviderRequestFailedError &&
      err.message ===
        "LLM request failed (lmstudio) to http://localhost:1234/v1/chat/completions: fetch failed (connect ECONNREFUSED 127.0.0.1:1234)"
  );
  assert.equal(calls.length, 3);
});

test("ollama: generate endpoint with system text prepended", async () => {
  const { calls, fetch } = recordingFetch([jsonResponse({ response: "from ollama", done: true })]);
  const config = withLlm({
    provider: "ollama",
    model: "llama2",
    endpoint: "http://localhost:11434/api/generate"
  });

  const text = await runChatCompletion(config, MESSAGES, { fetch, sleep: noSleep });

  assert.equal(text, "from ollama");
  assert.equal(calls[0]?.url, "http://localhost:11434/api/generate");
  assert.equal(calls[0]?.body.prompt, "Respond with JSON.\n\nAnalyze this.");
  assert.equal(calls[0]?.body.stream, false);
  assert.equal(calls[0]?.body.model, "llama2");
});

test("responses without text raise LlmResponseMissingContentError", async () => {
  const { fetch } = recordingFetch([jsonResponse({ choices: [] })]);

  await assert.rejects(
    () => runChatCompletion(withLlm({}), MESSAGES, { fetch, sleep: noSleep }),
    LlmResponseMissingContentError
  );
});

test("hosted providers need an API key", async () => {
  await assert.rejects(
    () => runChatCompletion(withLlm({ provider: "openai", apiKey: "" }), MESSAGES),
    LlmMissingApiKeyError
  );
});

test("hosted providers log the token usage the SDK reports", async () => {
  const debug: Array<{ message: string; meta?: Record<string, unknown> }> = [];
  const logger: Logger = { ...noopLogger, debug: (message, meta) => debug.push({ message, meta }) };
  const options: SdkAdapterOptions[] = [];
  const config = withLlm({
    provider: "openai",
    model: "gpt-4o-mini",
    apiKey: "test-secret",
    baseUrl: "https://llm.example.test/"
  });

  const text = await runChatCompletion(config, MESSAGES, {
    logger,
    openAiAdapter: async (_input, adapterOptions) => {
      options.push(adapterOptions);
      return { text: "ok", usage: { inputTokens: 12, outputTokens: 5, totalTokens: 17 } };
    }
  });

  assert.equal(text, "ok");
  assert.equal(options[0]?.baseUrl, "https://llm.example.test/v1");
  assert.equal(options[0]?.apiKey, "test-secret");
  assert.deepEqual(debug, [
    {
      message: "LLM token usage",
      meta: { provider: "openai", model: "gpt-4o-mini", inputTokens: 12, outputTokens: 5, totalTokens: 17 }
    }
  ]);
});

test("SDK results without usage log nothing", async () => {
  const debug: string[] = [];
  const logger: Logger = { ...noopLogger, debug: (message) => debug.push(message) };
  const config = withLlm({ provider: "anthropic", model: "claude-sonnet-4-20250514", apiKey: "test-secret" });

  const text = await runChatCompletion(config, MESSAGES, {
    logger,
    anthropicAdapter: async () => ({ text: "plain" })
  });

  assert.equal(text, "plain");
  assert.deepEqual(debug, []);
});

test("extractCompletionText understands the common response shapes", () => {
  assert.equal(extractCompletionText({ choices: [{ message: { content: "a" } }] }), "a");
  assert.equal(extractCompletionText({ choices: [{ text: "b" }] }), "b");
  assert.equal(extractCompletionText({ response: "c" }), "c");
  assert.equal(extractCompletionText({ text: "d" }), "d");
  assert.equal(extractCompletionText({ message: { content: "e" } }), "e");
  assert.equal(extractCompletionText({ choices: [{ message: { content: "" } }] }), null);
  assert.equal(extractCompletionText("raw"), null);
});

test("buildOllamaPrompt puts system messages first", () => {
  assert.equal(
    buildOllamaPrompt([
      { role: "user", content: "question" },
      { role: "system", content: "rules" }
    ]),
    "rules\n\nquestion"
  );
});
