import { readFile } from "node:fs/promises";
import { SEVERITIES } from "../types.js";
import type { Finding, Severity, TriageAnnotation } from "../types.js";
import type { CodeContext } from "./codeContext.js";
import { snippetContext } from "./codeContext.js";
import { escapeHtml, escapeInlineBlock } from "./html.js";
import type { ReportMeta } from "./jsonReport.js";
import { countBySeverity } from "./jsonReport.js";

export interface ReportAssets {
  css: string;
  script: string;
}

export interface HtmlReportOptions {
  itemsPerPage: number;
  assets: ReportAssets;
  // Keyed by finding id; findings without an entry show the scanner snippet.
  contexts?: Map<string, CodeContext>;
}

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: "Critical",
  high: "High",
  medium: "Medium",
  low: "Low",
  info: "Info"
};

const ASSETS_DIR = new URL("../../assets/", import.meta.url);

export async function loadReportAssets(): Promise<ReportAssets> {
  const [css, script] = await Promise.all([
    readFile(new URL("report.css", ASSETS_DIR), "utf-8"),
    readFile(new URL("report.js", ASSETS_DIR), "utf-8")
  ]);
  return { css, script };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatDisplayTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function renderScannerLine(meta: ReportMeta): string {
  const parts = meta.scanners.map((run) => {
    if (run.status === "ok") return `${run.tool} (${run.findings.length})`;
    return `${run.tool} (${run.status})`;
  });
  return parts.length ? parts.join(", ") : "none";
}

function renderTriageLine(meta: ReportMeta): string {
  const { triage } = meta;
  if (!triage.enabled) return "LLM triage: skipped";
  const model = triage.model ? ` / ${triage.model}` : "";
  return `LLM triage: ${triage.provider ?? "unknown"}${model}, ${triage.analyzed} analyzed`;
}

function renderHeader(meta: ReportMeta): string {
  return [
    '<div class="header">',
    "  <h1>Security Scan Report</h1>",
    `  <p>Generated: ${escapeHtml(formatDisplayTime(meta.generatedAt))}</p>`,
    `  <p>Target: ${escapeHtml(meta.target)}</p>`,
    `  <p>Scanners: ${escapeHtml(renderScannerLine(meta))}</p>`,
    `  <p>${escapeHtml(renderTriageLine(meta))}</p>`,
    "</div>"
  ].join("\n");
}

function renderSummary(findings: Finding[]): string {
  const counts = countBySeverity(findings);
  const stats = SEVERITIES.map(
    (severity) =>
      `  <button type="button" class="stat ${severity}" data-severity="${severity}">` +
      `<h3>${counts[severity]}</h3><p>${SEVERITY_LABELS[severity]}</p></button>`
  );
  return ['<div class="summary">', ...stats, "</div>"].join("\n");
}

function renderCode(context: CodeContext): string {
  if (!context.lines.length) {
    return '<pre class="code"><span class="line">(no code available)</span></pre>';
  }
  const lines = context.lines.map((line) => {
    const cls = line.highlight ? "line flagged" : "line";
    return `<span class="${cls}"><span class="line-number">${line.lineNumber}</span>${escapeHtml(line.text)}</span>`;
  });
  return `<pre class="code">${lines.join("")}</pre>`;
}

function renderTriage(triage: TriageAnnotation | undefined, current: Severity): string {
  if (!triage) return "";
  if (triage.status === "error") {
    return [
      '  <div class="triage-error">',
      "    <h4>LLM Analysis</h4>",
      `    <p>${escapeHtml(triage.error)}</p>`,
      "  </div>"
    ].join("\n");
  }
  if (triage.status === "unparsed") {
    const detail = triage.parseError ? `: ${triage.parseError}` : "";
    return [
      '  <div class="triage-error">',
      "    <h4>LLM Analysis</h4>",
      `    <p>${escapeHtml(`The model response could not be parsed${detail}`)}</p>`,
      "  </div>"
    ].join("\n");
  }

  const parts: string[] = [];
  if (triage.impact) {
    parts.push(
      "  <h4>Impact</h4>",
      `  <p>${escapeHtml(triage.impact)}</p>`,
      "  <h4>Exploitability</h4>",
      `  <p>${triage.exploitability === null ? "N/A" : `${triage.exploitability}/5`}</p>`
    );
  }
  if (triage.falsePositive) {
    parts.push(`  <p class="meta">False positive likelihood: ${triage.falsePositive.toUpperCase()}</p>`);
  }
  if (triage.originalSeverity !== current) {
    parts.push(
      `  <p class="meta">Severity adjusted from ${triage.originalSeverity.toUpperCase()} to ${current.toUpperCase()}</p>`
    );
  }
  if (triage.remediation) {
    parts.push(
      '  <div class="remediation">',
      "    <h4>Remediation</h4>",
      `    <p>${escapeHtml(triage.remediation)}</p>`,
      "  </div>"
    );
  }
  return parts.join("\n");
}

function renderFinding(finding: Finding, index: number, context: CodeContext): string {
  const meta = [`Rule: ${finding.ruleId}`];
  if (finding.cwe.length) meta.push(`CWE: ${finding.cwe.join(", ")}`);
  if (finding.confidence) meta.push(`Confidence: ${finding.confidence}`);

  const lines = [
    `<div class="finding ${finding.severity}" data-severity="${finding.severity}" id="finding-${escapeHtml(finding.id)}">`,
    `  <h3>${index}. ${escapeHtml(finding.title)}</h3>`,
    `  <span class="severity ${finding.severity}">${finding.severity.toUpperCase()}</span>`,
    `  <p class="location">File: ${escapeHtml(`${finding.filepath}:${finding.line}`)} | Tool: ${finding.tool}</p>`,
    `  <p class="meta">${escapeHtml(meta.join(" | "))}</p>`,
    "  <h4>Description</h4>",
    `  <p>${escapeHtml(finding.message)}</p>`,
    "  <h4>Vulnerable Code</h4>",
    `  ${renderCode(context)}`
  ];
  const triage = renderTriage(finding.triage, finding.severity);
  if (triage) lines.push(triage);
  lines.push("</div>");
  return lines.join("\n");
}

function renderNotes(itemsPerPage: number): string {
  return [
    '<div class="notes">',
    "  <h3>Important Notes</h3>",
    "  <ul>",
    "    <li>LLM-generated suggestions should be reviewed by a human security expert</li>",
    "    <li>False positives are possible - verify each finding in context</li>",
    `    <li>Use the pagination controls to navigate through findings (${itemsPerPage} per page)</li>`,
    "    <li>Always test remediation in a safe environment before production</li>",
    "  </ul>",
    "</div>"
  ].join("\n");
}

export function renderHtmlReport(findings: Finding[], meta: ReportMeta, options: HtmlReportOptions): string {
  const cards = findings.length
    ? findings
        .map((finding, index) =>
          renderFinding(finding, index + 1, options.contexts?.get(finding.id) ?? snippetContext(finding))
        )
        .join("\n")
    : "<p>No findings.</p>";

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(`Security Scan Report - ${meta.target}`)}</title>`,
    `<style>\n${escapeInlineBlock(options.assets.css)}\n</style>`,
    "</head>",
    `<body data-items-per-page="${options.itemsPerPage}">`,
    renderHeader(meta),
    renderSummary(findings),
    '<div class="filter-hint">',
    "  Click on severity boxes above to filter findings. Click multiple to combine filters. Click again to remove filter.",
    "</div>",
    '<div id="results-count" class="results-count"></div>',
    '<div class="findings-container">',
    "<h2>Findings</h2>",
    cards,
    '<div id="pagination" class="pagination hidden"></div>',
    "</div>",
    renderNotes(options.itemsPerPage),
    `<script>\n${escapeInlineBlock(options.assets.script)}\n</script>`,
    "</body>",
    "</html>",
    ""
  ].join("\n");
}
