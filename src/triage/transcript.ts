import { appendFile } from "node:fs/promises";
import type { Finding } from "../types.js";

export const TRANSCRIPT_SEPARATOR = "=".repeat(60);

export interface PromptTranscript {
  path: string | null;
  recordPrompt: (finding: Finding, prompt: string) => Promise<void>;
  recordResponse: (response: string) => Promise<void>;
}

export const noopTranscript: PromptTranscript = {
  path: null,
  recordPrompt: async () => {},
  recordResponse: async () => {}
};

export function createPromptTranscript(filePath: string | null, now: () => Date = () => new Date()): PromptTranscript {
  if (!filePath) return noopTranscript;
  return {
    path: filePath,
    recordPrompt: async (finding, prompt) => {
      await appendFile(
        filePath,
        `\n${TRANSCRIPT_SEPARATOR}\nTimestamp: ${now().toISOString()}\nFinding: ${finding.title}\nPrompt:\n${prompt}\n`,
        "utf-8"
      );
    },
    recordResponse: async (response) => {
      await appendFile(filePath, `Response:\n${response}\n`, "utf-8");
    }
  };
}
