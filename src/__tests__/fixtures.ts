import {
  DEFAULT_CRITICAL_KEYWORDS,
  DEFAULT_EXCLUDES,
  DEFAULT_HIGH_KEYWORDS
} from "../config/defaults.js";
import type { SecReviewConfig } from "../config/loadConfig.js";
import { findingId } from "../scan/dedupeKey.js";
import type { Finding } from "../types.js";

export function makeConfig(workspaceRoot: string, patch: Partial<SecReviewConfig> = {}): SecReviewConfig {
  return {
    workspaceRoot,
    stateDir: `${workspaceRoot}/.secreview`,
    reportsDir: `${workspaceRoot}/reports`,
    llm: {
      provider: "lmstudio",
      model: "local-model",
      baseUrl: "http://localhost:1234",
      endpoint: "http://localhost:1234/v1/chat/completions",
      apiKey: "",
      temperature: 0.3,
      maxTokens: 2000,
      timeoutMs: 120_000,
      topK: 10
    },
    scanners: {
      timeoutSeconds: 300,
      exclude: [...DEFAULT_EXCLUDES],
      semgrep: { enabled: true, path: null, configs: ["auto"] },
      bandit: { enabled: true, path: null, level: "medium" }
    },
    triage: {
      criticalKeywords: [...DEFAULT_CRITICAL_KEYWORDS],
      highKeywords: [...DEFAULT_HIGH_KEYWORDS],
      snippetChars: 500
    },
    report: { itemsPerPage: 20, codeContextLines: 4 },
    ...patch
  };
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  const base: Omit<Finding, "id"> = {
    tool: "semgrep",
    ruleId: "python.lang.security.audit.eval-detected",
    title: "eval-detected",
    severity: "medium",
    message: "Detected use of eval",
    filepath: "app/main.py",
    line: 10,
    endLine: 10,
    snippet: "eval(user_input)",
    cwe: [],
    ...overrides
  };
  return { id: overrides.id ?? findingId(base), ...base };
}
