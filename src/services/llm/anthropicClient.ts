import Anthropic from "@anthropic-ai/sdk";

import {
  LlmResponseMissingContentError,
  ProviderApiResponseError,
  ProviderRequestFailedError
} from "../../errors/provider.errors.js";
import type { ChatMessage, LlmAdapterInput, LlmAdapterResult, LlmAdapterUsage, SdkAdapterOptions } from "./adapter.js";
import { normalizeUsageCount } from "./adapter.js";

type NonSystemChatMessage = ChatMessage & { role: Exclude<ChatMessage["role"], "system"> };

const splitSystemMessages = (
  messages: ChatMessage[]
): { system: string; rest: NonSystemChatMessage[] } => {
  const systemParts: string[] = [];
  const rest: NonSystemChatMessage[] = [];
  for (const message of messages) {
    if (message.role === "system") {
      systemParts.push(message.content);
    } else {
      rest.push({ role: message.role, content: message.content });
    }
  }
  return { system: systemParts.join("\n"), rest };
};

const extractUsage = (usage: Anthropic.Usage | undefined): LlmAdapterUsage | undefined => {
  if (!usage) return undefined;
  const inputTokens = normalizeUsageCount(usage.input_tokens);
  const outputTokens = normalizeUsageCount(usage.output_tokens);
  return {
    inputTokens,
    outputTokens,
    totalTokens: (inputTokens ?? 0) + (outputTokens ?? 0)
  };
};

const mapSdkError = (err: unknown, baseUrl: string): Error => {
  if (err instanceof Anthropic.APIConnectionError) {
    return new ProviderRequestFailedError("LLM", "anthropic", baseUrl, err.message);
  }
  if (err instanceof Anthropic.APIError) {
    return new ProviderApiResponseError(err.message, err.status ?? null);
  }
  return err instanceof Error ? err : new Error(String(err));
};

export async function runAnthropicAdapter(
  input: LlmAdapterInput,
  options: SdkAdapterOptions
): Promise<LlmAdapterResult> {
  const client = new Anthropic({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries
  });

  const { system, rest } = splitSystemMessages(input.messages);

  let message: Anthropic.Message;
  try {
    message = await client.messages.create({
      model: input.model,
      max_tokens: input.maxTokens,
      temperature: input.temperature,
      system: system.trim() ? system : undefined,
      messages: rest.map((entry) => ({
        role: entry.role,
        content: entry.content
      }))
    });
  } catch (err) {
    throw mapSdkError(err, options.baseUrl ?? "https://api.anthropic.com");
  }

  const text = message.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("");
  if (!text.trim()) {
    throw new LlmResponseMissingContentError(JSON.stringify(message).slice(0, 500));
  }

  return {
    text,
    usage: extractUsage(message.usage)
  };
}
