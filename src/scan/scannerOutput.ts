import { ScannerOutputParseError } from "../errors/scanner.errors.js";
import type { Finding, ScannerTool, Severity } from "../types.js";
import { findingId, normalizeFilepath } from "./dedupeKey.js";

type JsonRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toRecord(value: unknown): JsonRecord {
  return isPlainObject(value) ? value : {};
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asLine(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return Math.max(0, Math.trunc(value));
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number(value.trim());
  return 0;
}

function asStringList(value: unknown): string[] {
  if (typeof value === "string") return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
    .map((item) => String(item).trim())
    .filter(Boolean);
}

export function mapSeverity(tool: ScannerTool, raw: unknown): Severity {
  const value = (typeof raw === "string" ? raw : "").trim().toLowerCase();
  if (value === "high" || value === "medium" || value === "low") return value;
  if (tool === "semgrep") {
    if (value === "critical") return "critical";
    if (value === "error") return "high";
    if (value === "warning") return "medium";
    if (value === "info") return "low";
  }
  return "medium";
}

function parseJson(tool: ScannerTool, stdout: string): unknown {
  try {
    return JSON.parse(stdout);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ScannerOutputParseError(tool, message);
  }
}

function resultsOf(tool: ScannerTool, stdout: string): unknown[] {
  if (!stdout.trim()) return [];
  const json = parseJson(tool, stdout);
  if (!isPlainObject(json)) {
    throw new ScannerOutputParseError(tool, "expected a JSON object with a results array");
  }
  return Array.isArray(json.results) ? json.results : [];
}

function shortRuleName(checkId: string): string {
  const parts = checkId.split(".").filter(Boolean);
  return parts[parts.length - 1] ?? checkId;
}

function buildFinding(fields: Omit<Finding, "id">): Finding {
  return { id: findingId(fields), ...fields };
}

export function parseSemgrepOutput(stdout: string): Finding[] {
  const findings: Finding[] = [];
  for (const item of resultsOf("semgrep", stdout)) {
    const entry = toRecord(item);
    const extra = toRecord(entry.extra);
    const metadata = toRecord(extra.metadata);
    const checkId = asString(entry.check_id)?.trim() ?? "";
    const line = asLine(toRecord(entry.start).line);
    const endLine = asLine(toRecord(entry.end).line) || line;

    findings.push(
      buildFinding({
        tool: "semgrep",
        ruleId: checkId || "semgrep",
        title: checkId ? shortRuleName(checkId) : "Unknown",
        severity: mapSeverity("semgrep", extra.severity),
        message: asString(extra.message)?.trim() || checkId,
        filepath: normalizeFilepath(asString(entry.path) ?? ""),
        line,
        endLine: Math.max(endLine, line),
        snippet: asString(extra.lines) ?? "",
        cwe: asStringList(metadata.cwe)
      })
    );
  }
  return findings;
}

export function parseBanditOutput(stdout: string): Finding[] {
  const findings: Finding[] = [];
  for (const item of resultsOf("bandit", stdout)) {
    const entry = toRecord(item);
    const testName = asString(entry.test_name)?.trim() ?? "";
    const testId = asString(entry.test_id)?.trim() ?? "";
    const line = asLine(entry.line_number);
    const range = Array.isArray(entry.line_range) ? entry.line_range.map(asLine) : [];
    const endLine = range.length ? Math.max(line, ...range) : line;
    const cweId = toRecord(entry.issue_cwe).id;
    const cwe = cweId === undefined || cweId === null || cweId === "" ? [] : [`CWE-${String(cweId)}`];
    const confidence = asString(entry.issue_confidence)?.trim().toLowerCase();

    findings.push(
      buildFinding({
        tool: "bandit",
        ruleId: testId || testName || "bandit",
        title: testName || "Unknown",
        severity: mapSeverity("bandit", entry.issue_severity),
        message: asString(entry.issue_text)?.trim() ?? "",
        filepath: normalizeFilepath(asString(entry.filename) ?? ""),
        line,
        endLine,
        snippet: asString(entry.code) ?? "",
        cwe,
        ...(confidence ? { confidence } : {})
      })
    );
  }
  return findings;
}
