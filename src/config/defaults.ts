export const CONFIG_FILE_NAMES = ["secreview.config.json", ".secreviewrc.json"];

export const STATE_DIR_NAME = ".secreview";

export const DEFAULT_REPORTS_DIR = "reports";

export const DEFAULT_SEMGREP_CONFIGS = ["auto"];

export const DEFAULT_EXCLUDES = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.secreview/**",
  "**/.venv/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/dist/**",
  "**/build/**"
];

export const DEFAULT_CRITICAL_KEYWORDS = [
  "sql injection",
  "command injection",
  "code injection",
  "xxe",
  "deserialization",
  "path traversal",
  "rce"
];

export const DEFAULT_HIGH_KEYWORDS = [
  "xss",
  "csrf",
  "authentication",
  "authorization",
  "hardcoded",
  "secret",
  "password",
  "crypto"
];

export const DEFAULT_SCANNER_TIMEOUT_SECONDS = 300;
export const DEFAULT_LLM_TIMEOUT_SECONDS = 120;
export const DEFAULT_LLM_TOP_K = 10;
export const DEFAULT_ITEMS_PER_PAGE = 20;
export const DEFAULT_CODE_CONTEXT_LINES = 4;
export const DEFAULT_LLM_TEMPERATURE = 0.3;
export const DEFAULT_LLM_MAX_TOKENS = 2000;

const DEFAULT_BASE_URLS = {
  lmstudio: "http://localhost:1234",
  ollama: "http://localhost:11434",
  openai: "https://api.openai.com",
  anthropic: "https://api.anthropic.com"
} as const;

const DEFAULT_LLM_MODELS = {
  lmstudio: "local-model",
  ollama: "llama2",
  openai: "gpt-4o-mini",
  anthropic: "claude-sonnet-4-20250514"
} as const;

type DefaultProviderId = keyof typeof DEFAULT_BASE_URLS;

export function defaultBaseUrl(provider: DefaultProviderId): string {
  return DEFAULT_BASE_URLS[provider];
}

export function defaultLlmModel(provider: DefaultProviderId): string {
  return DEFAULT_LLM_MODELS[provider];
}
