import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";

import {
  LlmResponseMissingContentError,
  ProviderApiResponseError,
  ProviderRequestFailedError
} from "../../errors/provider.errors.js";
import type { ChatMessage, LlmAdapterInput, LlmAdapterResult, LlmAdapterUsage, SdkAdapterOptions } from "./adapter.js";
import { normalizeUsageCount } from "./adapter.js";

const toMessageParam = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
    default:
      return { role: "user", content: message.content };
  }
};

const extractUsage = (usage: OpenAI.CompletionUsage | undefined): LlmAdapterUsage | undefined => {
  if (!usage) return undefined;
  return {
    inputTokens: normalizeUsageCount(usage.prompt_tokens),
    outputTokens: normalizeUsageCount(usage.completion_tokens),
    totalTokens: normalizeUsageCount(usage.total_tokens)
  };
};

const mapSdkError = (err: unknown, baseUrl: string): Error => {
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderRequestFailedError("LLM", "openai", baseUrl, err.message);
  }
  if (err instanceof OpenAI.APIError) {
    return new ProviderApiResponseError(err.message, err.status ?? null);
  }
  return err instanceof Error ? err : new Error(String(err));
};

export async function runOpenAiAdapter(
  input: LlmAdapterInput,
  options: SdkAdapterOptions
): Promise<LlmAdapterResult> {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries
  });

  let completion: OpenAI.Chat.Completions.ChatCompletion;
  try {
    completion = await client.chat.completions.create({
      model: input.model,
      messages: input.messages.map(toMessageParam),
      temperature: input.temperature,
      max_tokens: input.maxTokens
    });
  } catch (err) {
    throw mapSdkError(err, options.baseUrl ?? "https://api.openai.com/v1");
  }

  const text = completion.choices[0]?.message?.content ?? "";
  if (!text.trim()) {
    throw new LlmResponseMissingContentError(JSON.stringify(completion).slice(0, 500));
  }

  return {
    text,
    usage: extractUsage(completion.usage)
  };
}
