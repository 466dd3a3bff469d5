export class ConfigUnsupportedProviderError extends Error {
  constructor(provider: string) {
    super(`Unsupported LLM provider "${provider}". Use lmstudio, ollama, openai or anthropic (claude).`);
    this.name = "ConfigUnsupportedProviderError";
  }
}

export class ConfigMissingApiKeyError extends Error {
  constructor(provider: string) {
    const envName = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
    super(
      `Missing API key for ${provider}. Set SECREVIEW_LLM_API_KEY (or ${envName}) or llm.apiKey in secreview.config.json, or pass --skip-llm.`
    );
    this.name = "ConfigMissingApiKeyError";
  }
}

export class ConfigInvalidValueError extends Error {
  constructor(key: string, value: unknown, expected: string) {
    super(`Invalid config value for ${key}: ${JSON.stringify(value)} (expected ${expected}).`);
    this.name = "ConfigInvalidValueError";
  }
}

export class ConfigFileParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Could not load config file ${filePath}: ${message}`);
    this.name = "ConfigFileParseError";
  }
}
