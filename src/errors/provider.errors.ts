export class ProviderRequestFailedError extends Error {
  constructor(label: string, provider: string, url: string, message: string) {
    super(`${label} request failed (${provider}) to ${url}: ${message}`);
    this.name = "ProviderRequestFailedError";
  }
}

export class ProviderApiResponseError extends Error {
  status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ProviderApiResponseError";
    this.status = status;
  }
}

export class LlmMissingApiKeyError extends Error {
  constructor() {
    super("Missing LLM API key.");
    this.name = "LlmMissingApiKeyError";
  }
}

export class LlmResponseMissingContentError extends Error {
  constructor(preview?: string) {
    super(
      preview
        ? `LLM response missing message content. Response preview: ${preview}`
        : "LLM response missing message content."
    );
    this.name = "LlmResponseMissingContentError";
  }
}
