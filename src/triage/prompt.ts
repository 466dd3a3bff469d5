import type { ChatMessage } from "../providers/llm.js";
import { SEVERITIES } from "../types.js";
import type { FalsePositiveLikelihood, Finding, Severity, TriageAnnotation } from "../types.js";

export const TRIAGE_SYSTEM_PROMPT =
  "You are a senior security engineer analyzing code vulnerabilities. Always respond with valid JSON only, no preamble or explanations.";

export const DEFAULT_SNIPPET_CHARS = 500;

const RESPONSE_EXAMPLE =
  '{"exploitability": 4, "impact": "...", "false_positive": "LOW", "remediation": "...", "priority": "HIGH"}';

type JsonRecord = Record<string, unknown>;

export function buildTriagePrompt(finding: Finding, snippetChars = DEFAULT_SNIPPET_CHARS): string {
  return [
    "Analyze this security vulnerability:",
    "",
    `Title: ${finding.title}`,
    `Severity: ${finding.severity.toUpperCase()}`,
    `File: ${finding.filepath}:${finding.line}`,
    `Description: ${finding.message}`,
    "Code snippet:",
    finding.snippet.slice(0, snippetChars),
    "",
    "Provide:",
    "1. EXPLOITABILITY: How easily can this be exploited? (1-5 scale, 5=trivial)",
    "2. IMPACT: What's the worst-case outcome?",
    "3. FALSE_POSITIVE: Likelihood this is a false alarm? (LOW/MEDIUM/HIGH)",
    "4. REMEDIATION: Specific code fix (max 3 lines)",
    "5. PRIORITY: CRITICAL/HIGH/MEDIUM/LOW",
    "",
    "Format as JSON:",
    RESPONSE_EXAMPLE
  ].join("\n");
}

export function buildTriageMessages(finding: Finding, snippetChars = DEFAULT_SNIPPET_CHARS): ChatMessage[] {
  return [
    { role: "system", content: TRIAGE_SYSTEM_PROMPT },
    { role: "user", content: buildTriagePrompt(finding, snippetChars) }
  ];
}

export function extractJsonObject(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  const candidate = fenced?.[1] ?? text;
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) return null;
  return candidate.slice(start, end + 1);
}

function stripJsonComments(input: string): string {
  let output = "";
  let inString = false;
  let escape = false;
  for (let i = 0; i < input.length; i += 1) {
    const char = input[i] ?? "";
    const next = input[i + 1] ?? "";
    if (!inString && char === "/" && next === "/") {
      i += 1;
      while (i + 1 < input.length && input[i + 1] !== "\n") {
        i += 1;
      }
      continue;
    }
    if (!inString && char === "/" && next === "*") {
      i += 1;
      while (i + 1 < input.length) {
        if (input[i] === "*" && input[i + 1] === "/") {
          i += 1;
          break;
        }
        i += 1;
      }
      continue;
    }
    output += char;
    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === "\"") {
      inString = !inString;
    }
  }
  return output;
}

function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    return value
      .map((item) => toText(item))
      .filter(Boolean)
      .join("\n");
  }
  return "";
}

export function coerceExploitability(value: unknown): number | null {
  let numeric: number | null = null;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string") {
    const match = value.trim().match(/^\d+(?:\.\d+)?/);
    numeric = match ? Number(match[0]) : null;
  }
  if (numeric === null || !Number.isFinite(numeric)) return null;
  return Math.min(5, Math.max(1, Math.round(numeric)));
}

export function coerceFalsePositive(value: unknown): FalsePositiveLikelihood | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === "low" || normalized === "high") return normalized;
  if (normalized === "medium" || normalized === "med") return "medium";
  return null;
}

export function coerceSeverity(value: unknown): Severity | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  return SEVERITIES.find((severity) => severity === normalized) ?? null;
}

/**
 * Turns a model reply into a triage annotation. Replies without any JSON
 * object, or with one that does not parse, are kept verbatim as "unparsed".
 */
export function parseTriageResponse(raw: string, originalSeverity: Severity): TriageAnnotation {
  const json = extractJsonObject(raw);
  if (json === null) {
    return { status: "unparsed", rawResponse: raw };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(json));
  } catch (err) {
    return {
      status: "unparsed",
      rawResponse: raw,
      parseError: err instanceof Error ? err.message : String(err)
    };
  }
  if (!isRecord(parsed)) {
    return { status: "unparsed", rawResponse: raw, parseError: "expected a JSON object" };
  }

  return {
    status: "analyzed",
    exploitability: coerceExploitability(parsed.exploitability),
    impact: toText(parsed.impact),
    falsePositive: coerceFalsePositive(parsed.false_positive),
    remediation: toText(parsed.remediation),
    priority: coerceSeverity(parsed.priority),
    originalSeverity
  };
}

export function applyTriageVerdict(finding: Finding, annotation: TriageAnnotation): Finding {
  if (annotation.status !== "analyzed") {
    return { ...finding, triage: annotation };
  }
  let severity = finding.severity;
  if (annotation.falsePositive === "high") {
    severity = "info";
  } else if (annotation.priority) {
    severity = annotation.priority;
  }
  return { ...finding, severity, triage: annotation };
}
