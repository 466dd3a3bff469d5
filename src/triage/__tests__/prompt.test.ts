import assert from "node:assert/strict";
import { test } from "node:test";
import { makeFinding } from "../../__tests__/fixtures.js";
import {
  TRIAGE_SYSTEM_PROMPT,
  applyTriageVerdict,
  buildTriageMessages,
  buildTriagePrompt,
  coerceExploitability,
  extractJsonObject,
  parseTriageResponse
} from "../prompt.js";

test("buildTriagePrompt lists the finding and caps the snippet", () => {
  const finding = makeFinding({
    title: "eval-detected",
    severity: "high",
    filepath: "app/main.py",
    line: 10,
    message: "Detected use of eval",
    snippet: "x".repeat(600)
  });

  const prompt = buildTriagePrompt(finding);
  const lines = prompt.split("\n");

  assert.deepEqual(lines.slice(0, 7), [
    "Analyze this security vulnerability:",
    "",
    "Title: eval-detected",
    "Severity: HIGH",
    "File: app/main.py:10",
    "Description: Detected use of eval",
    "Code snippet:"
  ]);
  assert.equal(lines[7], "x".repeat(500));
  assert.equal(
    lines[lines.length - 1],
    '{"exploitability": 4, "impact": "...", "false_positive": "LOW", "remediation": "...", "priority": "HIGH"}'
  );
});

test("buildTriageMessages pairs the system prompt with the finding prompt", () => {
  const finding = makeFinding();
  const messages = buildTriageMessages(finding, 20);
  assert.deepEqual(messages, [
    { role: "system", content: TRIAGE_SYSTEM_PROMPT },
    { role: "user", content: buildTriagePrompt(finding, 20) }
  ]);
});

test("extractJsonObject prefers fenced blocks, then the outermost braces", () => {
  assert.equal(extractJsonObject('```json\n{"a": 1}\n```'), '{"a": 1}');
  assert.equal(extractJsonObject('Here you go: {"a": {"b": 2}} thanks'), '{"a": {"b": 2}}');
  assert.equal(extractJsonObject("no json here"), null);
});

test("coerceExploitability clamps to 1-5", () => {
  assert.equal(coerceExploitability(4), 4);
  assert.equal(coerceExploitability("3/5"), 3);
  assert.equal(coerceExploitability(9), 5);
  assert.equal(coerceExploitability(0), 1);
  assert.equal(coerceExploitability("high"), null);
  assert.equal(coerceExploitability(null), null);
});

test("parseTriageResponse builds an analyzed annotation", () => {
  const raw = [
    "```json",
    "{",
    '  "exploitability": "4",',
    '  "impact": "Remote code execution",',
    "  // the model sometimes adds comments",
    '  "false_positive": "Low",',
    '  "remediation": ["Use ast.literal_eval", "Validate input"],',
    '  "priority": "critical"',
    "}",
    "```"
  ].join("\n");

  assert.deepEqual(parseTriageResponse(raw, "medium"), {
    status: "analyzed",
    exploitability: 4,
    impact: "Remote code execution",
    falsePositive: "low",
    remediation: "Use ast.literal_eval\nValidate input",
    priority: "critical",
    originalSeverity: "medium"
  });
});

test("parseTriageResponse keeps replies it cannot read", () => {
  assert.deepEqual(parseTriageResponse("I cannot help with that.", "low"), {
    status: "unparsed",
    rawResponse: "I cannot help with that."
  });

  const broken = parseTriageResponse('{"impact": "x",}', "low");
  assert.equal(broken.status, "unparsed");
  assert.ok(broken.status === "unparsed" && typeof broken.parseError === "string");
});

test("applyTriageVerdict: high false-positive likelihood demotes to info", () => {
  const finding = makeFinding({ severity: "high" });
  const fp = parseTriageResponse('{"false_positive": "HIGH", "priority": "CRITICAL"}', "high");
  const prioritized = parseTriageResponse('{"false_positive": "MEDIUM", "priority": "LOW"}', "high");
  const noPriority = parseTriageResponse('{"false_positive": "LOW", "priority": "urgent"}', "high");

  assert.equal(applyTriageVerdict(finding, fp).severity, "info");
  assert.equal(applyTriageVerdict(finding, prioritized).severity, "low");
  assert.equal(applyTriageVerdict(finding, noPriority).severity, "high");

  const failed = applyTriageVerdict(finding, { status: "error", error: "timeout" });
  assert.equal(failed.severity, "high");
  assert.deepEqual(failed.triage, { status: "error", error: "timeout" });
});
