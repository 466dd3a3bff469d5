import { setTimeout as delay } from "node:timers/promises";

import type { LLMProvider, SecReviewConfig } from "../config/loadConfig.js";
import {
  LlmMissingApiKeyError,
  LlmResponseMissingContentError,
  ProviderApiResponseError,
  ProviderRequestFailedError
} from "../errors/provider.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { ChatMessage, LlmAdapterInput, LlmAdapterResult, SdkAdapterOptions } from "../services/llm/adapter.js";
import { runAnthropicAdapter } from "../services/llm/anthropicClient.js";
import { runOpenAiAdapter } from "../services/llm/openaiClient.js";

export type { ChatMessage, ChatRole } from "../services/llm/adapter.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SdkAdapterFn = (input: LlmAdapterInput, options: SdkAdapterOptions) => Promise<LlmAdapterResult>;

export interface LlmRequestDeps {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  openAiAdapter?: SdkAdapterFn;
  anthropicAdapter?: SdkAdapterFn;
}

export type LlmSettings = Pick<SecReviewConfig, "llm">;

export type ChatCompletionFn = (messages: ChatMessage[]) => Promise<string>;

type JsonRecord = Record<string, unknown>;

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const MAX_ATTEMPTS = 3;
const BASE_DELAY_MS = 500;
const MAX_DELAY_MS = 5000;
const SDK_MAX_RETRIES = 2;

function parseRetryAfterMs(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds * 1000;
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) return timestamp - Date.now();
  return null;
}

function computeDelayMs(attempt: number, retryAfter: string | null): number {
  const retryAfterMs = parseRetryAfterMs(retryAfter);
  if (retryAfterMs !== null) {
    return Math.min(MAX_DELAY_MS, Math.max(0, retryAfterMs));
  }
  const backoff = Math.min(MAX_DELAY_MS, BASE_DELAY_MS * 2 ** (attempt - 1));
  const jitter = Math.floor(Math.random() * 100);
  return backoff + jitter;
}

async function safeFetch(
  url: string,
  init: RequestInit,
  provider: LLMProvider,
  timeoutMs: number,
  deps: LlmRequestDeps
): Promise<Response> {
  const fetchFn = deps.fetch ?? fetch;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  let lastError: unknown;
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      const response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      if (!RETRYABLE_STATUSES.has(response.status) || attempt === MAX_ATTEMPTS) {
        return response;
      }
      await response.body?.cancel();
      await sleep(computeDelayMs(attempt, response.headers.get("retry-after")));
    } catch (err) {
      lastError = err;
      if (attempt === MAX_ATTEMPTS) break;
      await sleep(computeDelayMs(attempt, null));
    }
  }

  throw new ProviderRequestFailedError("LLM", provider, url, describeFetchError(lastError));
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value : null;
}

async function readJsonPayload(response: Response): Promise<unknown> {
  const raw = await response.text();
  if (!raw.trim()) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function errorMessageOf(payload: unknown): string | null {
  if (typeof payload === "string") return nonEmptyString(payload.slice(0, 500));
  if (!isRecord(payload)) return null;
  const error = payload.error;
  if (typeof error === "string") return nonEmptyString(error);
  if (isRecord(error)) return nonEmptyString(error.message);
  return nonEmptyString(payload.message);
}

/**
 * Pulls the generated text out of the response shapes local servers use:
 * OpenAI-style chat and completion choices, Ollama's `response`, and bare
 * `content` / `text` / `message.content` fields.
 */
export function extractCompletionText(payload: unknown): string | null {
  if (!isRecord(payload)) return null;
  const choices = payload.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    if (isRecord(first)) {
      const message = first.message;
      const fromMessage = isRecord(message) ? nonEmptyString(message.content) : null;
      if (fromMessage) return fromMessage;
      const fromText = nonEmptyString(first.text);
      if (fromText) return fromText;
    }
  }
  for (const key of ["response", "content", "text"]) {
    const value = nonEmptyString(payload[key]);
    if (value) return value;
  }
  const message = payload.message;
  if (isRecord(message)) return nonEmptyString(message.content);
  return null;
}

function contentOrThrow(payload: unknown): string {
  const text = extractCompletionText(payload);
  if (text === null) {
    throw new LlmResponseMissingContentError(JSON.stringify(payload ?? null).slice(0, 500));
  }
  return text;
}

async function failOnStatus(response: Response): Promise<never> {
  const payload = await readJsonPayload(response);
  const detail = errorMessageOf(payload);
  throw new ProviderApiResponseError(
    `LLM request failed with status ${response.status}${detail ? `: ${detail}` : ""}`,
    response.status
  );
}

async function runLmStudio(config: LlmSettings, messages: ChatMessage[], deps: LlmRequestDeps): Promise<string> {
  const { llm } = config;
  const post = (body: JsonRecord) =>
    safeFetch(
      llm.endpoint,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body)
      },
      llm.provider,
      llm.timeoutMs,
      deps
    );

  const base: JsonRecord = {
    messages,
    temperature: llm.temperature,
    max_tokens: llm.maxTokens
  };

  // LM Studio answers with whatever model is loaded; only name one when it insists.
  let response = await post(base);
  if (!response.ok) {
    await response.body?.cancel();
    response = await post({ ...base, model: llm.model });
  }
  if (!response.ok) {
    return await failOnStatus(response);
  }
  return contentOrThrow(await readJsonPayload(response));
}

export function buildOllamaPrompt(messages: ChatMessage[]): string {
  const system = messages.filter((message) => message.role === "system").map((message) => message.content);
  const rest = messages.filter((message) => message.role !== "system").map((message) => message.content);
  return [...system, ...rest].join("\n\n");
}

async function runOllama(config: LlmSettings, messages: ChatMessage[], deps: LlmRequestDeps): Promise<string> {
  const { llm } = config;
  const response = await safeFetch(
    llm.endpoint,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: llm.model,
        prompt: buildOllamaPrompt(messages),
        stream: false,
        options: {
          temperature: llm.temperature,
          num_predict: llm.maxTokens
        }
      })
    },
    llm.provider,
    llm.timeoutMs,
    deps
  );
  if (!response.ok) {
    return await failOnStatus(response);
  }
  return contentOrThrow(await readJsonPayload(response));
}

function openAiBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

export async function runChatCompletion(
  config: LlmSettings,
  messages: ChatMessage[],
  deps: LlmRequestDeps = {}
): Promise<string> {
  const { llm } = config;

  switch (llm.provider) {
    case "lmstudio":
      return await runLmStudio(config, messages, deps);
    case "ollama":
      return await runOllama(config, messages, deps);
    case "openai":
    case "anthropic": {
      if (!llm.apiKey) {
        throw new LlmMissingApiKeyError();
      }
      const input = {
        provider: llm.provider,
        model: llm.model,
        messages,
        temperature: llm.temperature,
        maxTokens: llm.maxTokens
      };
      const options = {
        apiKey: llm.apiKey,
        timeoutMs: llm.timeoutMs,
        maxRetries: SDK_MAX_RETRIES
      };
      const result =
        llm.provider === "openai"
          ? await (deps.openAiAdapter ?? runOpenAiAdapter)(input, { ...options, baseUrl: openAiBaseUrl(llm.baseUrl) })
          : await (deps.anthropicAdapter ?? runAnthropicAdapter)(input, {
              ...options,
              baseUrl: llm.baseUrl.replace(/\/+$/, "")
            });
      if (result.usage) {
        (deps.logger ?? noopLogger).debug("LLM token usage", {
          provider: llm.provider,
          model: llm.model,
          ...result.usage
        });
      }
      return result.text;
    }
  }
}

export function createChatCompletion(config: LlmSettings, deps: LlmRequestDeps = {}): ChatCompletionFn {
  return (messages) => runChatCompletion(config, messages, deps);
}
