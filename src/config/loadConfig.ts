import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readEnvList, readFirstEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CODE_CONTEXT_LINES,
  DEFAULT_CRITICAL_KEYWORDS,
  DEFAULT_EXCLUDES,
  DEFAULT_HIGH_KEYWORDS,
  DEFAULT_ITEMS_PER_PAGE,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_TEMPERATURE,
  DEFAULT_LLM_TIMEOUT_SECONDS,
  DEFAULT_LLM_TOP_K,
  DEFAULT_REPORTS_DIR,
  DEFAULT_SCANNER_TIMEOUT_SECONDS,
  DEFAULT_SEMGREP_CONFIGS,
  STATE_DIR_NAME,
  defaultBaseUrl,
  defaultLlmModel
} from "./defaults.js";
import {
  ConfigFileParseError,
  ConfigInvalidValueError,
  ConfigMissingApiKeyError,
  ConfigUnsupportedProviderError
} from "../errors/config.errors.js";

export const LLMProviderId = {
  LmStudio: "lmstudio",
  Ollama: "ollama",
  OpenAI: "openai",
  Anthropic: "anthropic"
} as const;

export type LLMProvider = (typeof LLMProviderId)[keyof typeof LLMProviderId];

const PROVIDER_ALIASES: Record<string, LLMProvider> = {
  lmstudio: LLMProviderId.LmStudio,
  "lm-studio": LLMProviderId.LmStudio,
  lm_studio: LLMProviderId.LmStudio,
  ollama: LLMProviderId.Ollama,
  openai: LLMProviderId.OpenAI,
  anthropic: LLMProviderId.Anthropic,
  claude: LLMProviderId.Anthropic
};

export type BanditLevel = "low" | "medium" | "high";

export interface SecReviewConfig {
  workspaceRoot: string;
  stateDir: string;
  reportsDir: string;
  llm: {
    provider: LLMProvider;
    model: string;
    baseUrl: string;
    endpoint: string;
    apiKey: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    topK: number;
  };
  scanners: {
    timeoutSeconds: number;
    exclude: string[];
    semgrep: {
      enabled: boolean;
      path: string | null;
      configs: string[];
    };
    bandit: {
      enabled: boolean;
      path: string | null;
      level: BanditLevel;
    };
  };
  triage: {
    criticalKeywords: string[];
    highKeywords: string[];
    snippetChars: number;
  };
  report: {
    itemsPerPage: number;
    codeContextLines: number;
  };
}

export interface ConfigOverrides {
  provider?: string;
  model?: string;
  llmTopK?: number;
  reportsDir?: string;
}

export interface LoadConfigParams {
  workspaceRoot: string;
  configPath?: string | null;
  requireLlm?: boolean;
  overrides?: ConfigOverrides;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function section(record: ConfigRecord, key: string): ConfigRecord {
  const value = record[key];
  return isRecord(value) ? value : {};
}

function pickString(record: ConfigRecord, key: string, label: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigInvalidValueError(label, value, "a string");
  }
  return value.trim() || undefined;
}

function pickNumber(
  record: ConfigRecord,
  key: string,
  label: string,
  opts: { min?: number; integer?: boolean } = {}
): number | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigInvalidValueError(label, value, "a number");
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigInvalidValueError(label, value, "an integer");
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigInvalidValueError(label, value, `a number >= ${opts.min}`);
  }
  return value;
}

function pickBoolean(record: ConfigRecord, key: string, label: string): boolean | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigInvalidValueError(label, value, "true or false");
  }
  return value;
}

function pickStringList(record: ConfigRecord, key: string, label: string): string[] | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigInvalidValueError(label, value, "an array of strings");
  }
  return value.map((item) => item.trim()).filter(Boolean);
}

function validateTopK(value: number, label: string): number {
  if (!Number.isInteger(value) || (value < 1 && value !== -1)) {
    throw new ConfigInvalidValueError(label, value, "a positive integer or -1 for all findings");
  }
  return value;
}

export function normalizeProvider(raw: string | undefined | null): LLMProvider {
  const value = (raw || "").trim().toLowerCase();
  if (!value) return LLMProviderId.LmStudio;
  const provider = PROVIDER_ALIASES[value];
  if (!provider) {
    throw new ConfigUnsupportedProviderError(raw ?? "");
  }
  return provider;
}

function normalizeBanditLevel(raw: string | undefined): BanditLevel {
  if (raw === undefined) return "medium";
  const value = raw.toLowerCase();
  if (value === "low" || value === "medium" || value === "high") return value;
  throw new ConfigInvalidValueError("scanners.bandit.level", raw, "low, medium or high");
}

function resolveEndpoint(provider: LLMProvider, baseUrl: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  switch (provider) {
    case LLMProviderId.Ollama:
      return `${base}/api/generate`;
    case LLMProviderId.Anthropic:
      return `${base}/v1/messages`;
    case LLMProviderId.LmStudio:
    case LLMProviderId.OpenAI:
    default:
      return `${base}/v1/chat/completions`;
  }
}

function resolveApiKey(provider: LLMProvider, fileKey: string | undefined): string {
  const providerEnv =
    provider === LLMProviderId.Anthropic
      ? ["ANTHROPIC_API_KEY"]
      : provider === LLMProviderId.OpenAI
        ? ["OPENAI_API_KEY"]
        : [];
  return readFirstEnv(["SECREVIEW_LLM_API_KEY", ...providerEnv]) || fileKey || "";
}

async function loadConfigFile(workspaceRoot: string, configPath?: string | null): Promise<ConfigRecord> {
  const candidates = configPath
    ? [path.resolve(workspaceRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(workspaceRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigFileParseError(candidate, message);
    }
    if (!isRecord(parsed)) {
      throw new ConfigFileParseError(candidate, "top-level value must be an object");
    }
    return parsed;
  }

  if (configPath) {
    throw new ConfigFileParseError(path.resolve(workspaceRoot, configPath), "file does not exist");
  }
  return {};
}

export async function loadConfig(params: LoadConfigParams): Promise<SecReviewConfig> {
  const configFile = await loadConfigFile(params.workspaceRoot, params.configPath);
  const overrides = params.overrides ?? {};
  const llmFile = section(configFile, "llm");
  const scannersFile = section(configFile, "scanners");
  const semgrepFile = section(scannersFile, "semgrep");
  const banditFile = section(scannersFile, "bandit");
  const triageFile = section(configFile, "triage");
  const reportFile = section(configFile, "report");

  const provider = normalizeProvider(
    overrides.provider ||
      readFirstEnv(["SECREVIEW_LLM_PROVIDER", "LLM_PROVIDER"]) ||
      pickString(llmFile, "provider", "llm.provider")
  );

  const baseUrl =
    readEnv("SECREVIEW_LLM_BASE") || pickString(llmFile, "baseUrl", "llm.baseUrl") || defaultBaseUrl(provider);

  const endpoint =
    (provider === LLMProviderId.LmStudio ? readEnv("LM_STUDIO_URL") : null) ||
    pickString(llmFile, "endpoint", "llm.endpoint") ||
    resolveEndpoint(provider, baseUrl);

  const model =
    overrides.model ||
    readEnv("SECREVIEW_LLM_MODEL") ||
    pickString(llmFile, "model", "llm.model") ||
    defaultLlmModel(provider);

  const topK = validateTopK(
    overrides.llmTopK ?? pickNumber(llmFile, "topK", "llm.topK") ?? DEFAULT_LLM_TOP_K,
    "llm.topK"
  );

  const reportsDir = path.resolve(
    params.workspaceRoot,
    overrides.reportsDir ||
      readEnv("SECREVIEW_REPORTS_DIR") ||
      pickString(configFile, "reportsDir", "reportsDir") ||
      DEFAULT_REPORTS_DIR
  );

  const cfg: SecReviewConfig = {
    workspaceRoot: params.workspaceRoot,
    stateDir: path.join(params.workspaceRoot, STATE_DIR_NAME),
    reportsDir,
    llm: {
      provider,
      model,
      baseUrl,
      endpoint,
      apiKey: resolveApiKey(provider, pickString(llmFile, "apiKey", "llm.apiKey")),
      temperature: pickNumber(llmFile, "temperature", "llm.temperature", { min: 0 }) ?? DEFAULT_LLM_TEMPERATURE,
      maxTokens:
        pickNumber(llmFile, "maxTokens", "llm.maxTokens", { min: 1, integer: true }) ?? DEFAULT_LLM_MAX_TOKENS,
      timeoutMs:
        (pickNumber(llmFile, "timeoutSeconds", "llm.timeoutSeconds", { min: 1 }) ?? DEFAULT_LLM_TIMEOUT_SECONDS) *
        1000,
      topK
    },
    scanners: {
      timeoutSeconds:
        pickNumber(scannersFile, "timeoutSeconds", "scanners.timeoutSeconds", { min: 1 }) ??
        DEFAULT_SCANNER_TIMEOUT_SECONDS,
      exclude: pickStringList(scannersFile, "exclude", "scanners.exclude") ?? DEFAULT_EXCLUDES,
      semgrep: {
        enabled: pickBoolean(semgrepFile, "enabled", "scanners.semgrep.enabled") ?? true,
        path: readEnv("SECREVIEW_SEMGREP_PATH") || pickString(semgrepFile, "path", "scanners.semgrep.path") || null,
        configs:
          readEnvList("SECREVIEW_SEMGREP_CONFIG") ||
          pickStringList(semgrepFile, "configs", "scanners.semgrep.configs") ||
          DEFAULT_SEMGREP_CONFIGS
      },
      bandit: {
        enabled: pickBoolean(banditFile, "enabled", "scanners.bandit.enabled") ?? true,
        path: readEnv("SECREVIEW_BANDIT_PATH") || pickString(banditFile, "path", "scanners.bandit.path") || null,
        level: normalizeBanditLevel(pickString(banditFile, "level", "scanners.bandit.level"))
      }
    },
    triage: {
      criticalKeywords:
        pickStringList(triageFile, "criticalKeywords", "triage.criticalKeywords") ?? DEFAULT_CRITICAL_KEYWORDS,
      highKeywords: pickStringList(triageFile, "highKeywords", "triage.highKeywords") ?? DEFAULT_HIGH_KEYWORDS,
      snippetChars:
        pickNumber(triageFile, "snippetChars", "triage.snippetChars", { min: 0, integer: true }) ?? 500
    },
    report: {
      itemsPerPage:
        pickNumber(reportFile, "itemsPerPage", "report.itemsPerPage", { min: 1, integer: true }) ??
        DEFAULT_ITEMS_PER_PAGE,
      codeContextLines:
        pickNumber(reportFile, "codeContextLines", "report.codeContextLines", { min: 0, integer: true }) ??
        DEFAULT_CODE_CONTEXT_LINES
    }
  };

  const isHosted = provider === LLMProviderId.OpenAI || provider === LLMProviderId.Anthropic;
  if (params.requireLlm !== false && isHosted && !cfg.llm.apiKey) {
    throw new ConfigMissingApiKeyError(provider);
  }

  return cfg;
}
