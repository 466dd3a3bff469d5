import assert from "node:assert/strict";
import { test } from "node:test";
import { makeFinding } from "../../__tests__/fixtures.js";
import type { ScannerRun } from "../../types.js";
import type { ReportMeta } from "../jsonReport.js";
import { buildJsonReport, countBySeverity, serializeJsonReport, summarizeScannerRun } from "../jsonReport.js";

const semgrepFinding = makeFinding({ severity: "high" });
const banditFinding = makeFinding({ tool: "bandit", ruleId: "B307", title: "blacklist", line: 12, endLine: 12 });

const semgrepRun: ScannerRun = { tool: "semgrep", status: "ok", findings: [semgrepFinding], durationMs: 1200 };

const META: ReportMeta = {
  scanId: "2026-01-05_09-03-07",
  generatedAt: new Date(Date.UTC(2026, 0, 5, 9, 3, 7)),
  target: "app",
  scanners: [
    semgrepRun,
    { tool: "bandit", status: "skipped", findings: [], durationMs: 0, message: "no Python sources" }
  ],
  triage: { enabled: false, provider: null, model: null, analyzed: 0 }
};

test("countBySeverity covers every severity", () => {
  assert.deepEqual(countBySeverity([semgrepFinding, banditFinding, makeFinding({ severity: "info" })]), {
    critical: 0,
    high: 1,
    medium: 1,
    low: 0,
    info: 1
  });
});

test("summarizeScannerRun reports counts instead of findings", () => {
  assert.deepEqual(summarizeScannerRun(semgrepRun), {
    tool: "semgrep",
    status: "ok",
    findings: 1,
    durationMs: 1200
  });
  assert.deepEqual(summarizeScannerRun({ tool: "bandit", status: "failed", findings: [], durationMs: 40, message: "exit 2" }), {
    tool: "bandit",
    status: "failed",
    findings: 0,
    durationMs: 40,
    message: "exit 2"
  });
});

test("buildJsonReport assembles metadata, summary and findings", () => {
  const report = buildJsonReport([semgrepFinding, banditFinding], META);

  assert.equal(report.scanId, "2026-01-05_09-03-07");
  assert.equal(report.timestamp, "2026-01-05T09:03:07.000Z");
  assert.equal(report.target, "app");
  assert.equal(report.totalFindings, 2);
  assert.deepEqual(report.summary, { critical: 0, high: 1, medium: 1, low: 0, info: 0 });
  assert.deepEqual(report.scanners, [
    { tool: "semgrep", status: "ok", findings: 1, durationMs: 1200 },
    { tool: "bandit", status: "skipped", findings: 0, durationMs: 0, message: "no Python sources" }
  ]);
  assert.deepEqual(report.triage, { enabled: false, provider: null, model: null, analyzed: 0 });
  assert.deepEqual(report.findings, [semgrepFinding, banditFinding]);
});

test("serializeJsonReport writes indented JSON with a trailing newline", () => {
  const report = buildJsonReport([semgrepFinding], META);
  const text = serializeJsonReport(report);

  assert.ok(text.endsWith("}\n"));
  assert.ok(text.startsWith('{\n  "scanId": "2026-01-05_09-03-07",\n'));
  assert.deepEqual(JSON.parse(text), report);
});
