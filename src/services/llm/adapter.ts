import type { LLMProvider } from "../../config/loadConfig.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmAdapterInput {
  provider: LLMProvider;
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

export interface LlmAdapterUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface LlmAdapterResult {
  text: string;
  usage?: LlmAdapterUsage;
}

export interface SdkAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export const normalizeUsageCount = (value: unknown): number | undefined => {
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  return Math.max(0, Math.trunc(value));
};
