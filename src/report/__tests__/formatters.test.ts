import assert from "node:assert/strict";
import { test } from "node:test";
import pc from "picocolors";
import { makeFinding } from "../../__tests__/fixtures.js";
import { formatFindingsText, formatSummaryText, hasActionableFindings, severityLabel } from "../formatters.js";

test("formatFindingsText handles an empty list", () => {
  assert.equal(formatFindingsText([]), "No findings.");
});

test("formatFindingsText numbers findings and includes triage output", () => {
  const analyzed = makeFinding({
    triage: {
      status: "analyzed",
      exploitability: 3,
      impact: "Code execution",
      falsePositive: "low",
      remediation: "Avoid eval\nValidate input",
      priority: null,
      originalSeverity: "medium"
    }
  });
  const failed = makeFinding({
    tool: "bandit",
    title: "blacklist",
    severity: "low",
    line: 4,
    message: "",
    triage: { status: "error", error: "timeout" }
  });

  assert.equal(
    formatFindingsText([analyzed, failed]),
    [
      `1. ${pc.yellow("MEDIUM")} eval-detected ${pc.dim("[semgrep]")}`,
      "  location: app/main.py:10",
      "  Detected use of eval",
      "  impact: Code execution",
      "  remediation: Avoid eval\n    Validate input",
      "",
      `2. ${pc.green("LOW")} blacklist ${pc.dim("[bandit]")}`,
      "  location: app/main.py:4",
      pc.dim("  triage: timeout")
    ].join("\n")
  );
});

test("severityLabel marks critical findings", () => {
  assert.equal(severityLabel("critical"), pc.bgRed(pc.white(" CRITICAL ")));
  assert.equal(severityLabel("info"), pc.blue("INFO"));
});

test("formatSummaryText lists counts, duration and report paths", () => {
  const text = formatSummaryText([makeFinding()], {
    durationMs: 1500,
    reportPath: "reports/scan/report.html",
    findingsPath: "reports/scan/findings.json"
  });

  assert.equal(
    text,
    [
      pc.bold("SCAN SUMMARY"),
      "------------",
      `- Findings: 1 total (${pc.dim("CRITICAL 0")}, ${pc.dim("HIGH 0")}, ${pc.yellow("MEDIUM 1")}, ${pc.dim("LOW 0")}, ${pc.dim("INFO 0")})`,
      "- Duration: 1.5s",
      `- HTML report: ${pc.cyan("reports/scan/report.html")}`,
      `- JSON report: ${pc.cyan("reports/scan/findings.json")}`
    ].join("\n")
  );
});

test("hasActionableFindings ignores informational findings", () => {
  assert.equal(hasActionableFindings([]), false);
  assert.equal(hasActionableFindings([makeFinding({ severity: "info" })]), false);
  assert.equal(hasActionableFindings([makeFinding({ severity: "info" }), makeFinding({ severity: "low" })]), true);
});
