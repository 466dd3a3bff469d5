import pc from "picocolors";
import { SEVERITIES } from "../types.js";
import type { Finding, Severity } from "../types.js";
import { countBySeverity } from "./jsonReport.js";

export function severityLabel(severity: Severity): string {
  switch (severity) {
    case "critical":
      return pc.bgRed(pc.white(" CRITICAL "));
    case "high":
      return pc.red("HIGH");
    case "medium":
      return pc.yellow("MEDIUM");
    case "info":
      return pc.blue("INFO");
    case "low":
    default:
      return pc.green("LOW");
  }
}

function severityCount(severity: Severity, count: number): string {
  const text = `${severity.toUpperCase()} ${count}`;
  if (count === 0) return pc.dim(text);
  switch (severity) {
    case "critical":
      return pc.bold(pc.red(text));
    case "high":
      return pc.red(text);
    case "medium":
      return pc.yellow(text);
    case "low":
      return pc.green(text);
    case "info":
    default:
      return pc.blue(text);
  }
}

function formatFinding(finding: Finding, index: number): string {
  const lines = [
    `${index}. ${severityLabel(finding.severity)} ${finding.title} ${pc.dim(`[${finding.tool}]`)}`,
    `  location: ${finding.filepath}:${finding.line}`
  ];
  if (finding.message) lines.push(`  ${finding.message}`);
  const triage = finding.triage;
  if (triage?.status === "analyzed") {
    if (triage.impact) lines.push(`  impact: ${triage.impact}`);
    if (triage.remediation) lines.push(`  remediation: ${triage.remediation.replace(/\n/g, "\n    ")}`);
  } else if (triage?.status === "error") {
    lines.push(pc.dim(`  triage: ${triage.error}`));
  }
  return lines.join("\n");
}

export function formatFindingsText(findings: Finding[]): string {
  if (!findings.length) {
    return "No findings.";
  }
  return findings.map((finding, index) => formatFinding(finding, index + 1)).join("\n\n");
}

export interface SummaryTextMeta {
  reportPath?: string | null;
  findingsPath?: string | null;
  durationMs?: number;
}

export function formatSummaryText(findings: Finding[], meta: SummaryTextMeta = {}): string {
  const counts = countBySeverity(findings);
  const lines = [
    pc.bold("SCAN SUMMARY"),
    "------------",
    `- Findings: ${findings.length} total (${SEVERITIES.map((severity) => severityCount(severity, counts[severity])).join(", ")})`
  ];
  if (meta.durationMs !== undefined) {
    lines.push(`- Duration: ${(meta.durationMs / 1000).toFixed(1)}s`);
  }
  if (meta.reportPath) lines.push(`- HTML report: ${pc.cyan(meta.reportPath)}`);
  if (meta.findingsPath) lines.push(`- JSON report: ${pc.cyan(meta.findingsPath)}`);
  return lines.join("\n");
}

// Anything above info is worth failing a CI job over.
export function hasActionableFindings(findings: Finding[]): boolean {
  return findings.some((finding) => finding.severity !== "info");
}
