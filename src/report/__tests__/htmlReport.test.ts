import assert from "node:assert/strict";
import { test } from "node:test";
import { makeFinding } from "../../__tests__/fixtures.js";
import type { CodeContext } from "../codeContext.js";
import { escapeHtml, escapeInlineBlock } from "../html.js";
import { formatDisplayTime, loadReportAssets, renderHtmlReport } from "../htmlReport.js";
import type { ReportMeta } from "../jsonReport.js";

const ASSETS = { css: "body { margin: 0; }", script: 'var closing = "</script>";' };

const META: ReportMeta = {
  scanId: "2026-01-05_09-03-07",
  generatedAt: new Date(2026, 0, 5, 9, 3, 7),
  target: "app",
  scanners: [
    { tool: "semgrep", status: "ok", findings: [], durationMs: 10 },
    { tool: "bandit", status: "skipped", findings: [], durationMs: 0, message: "no Python sources" }
  ],
  triage: { enabled: false, provider: null, model: null, analyzed: 0 }
};

const render = (findings = [makeFinding()], meta: ReportMeta = META, contexts?: Map<string, CodeContext>) =>
  renderHtmlReport(findings, meta, { itemsPerPage: 25, assets: ASSETS, contexts });

test("escapeHtml encodes markup characters", () => {
  assert.equal(escapeHtml(`<a href="x">Tom's & co</a>`), "&lt;a href=&quot;x&quot;&gt;Tom&#39;s &amp; co&lt;/a&gt;");
});

test("escapeInlineBlock keeps closing tags out of inline blocks", () => {
  assert.equal(escapeInlineBlock("a</script>b</STYLE>"), "a<\\/script>b<\\/STYLE>");
});

test("formatDisplayTime renders local time", () => {
  assert.equal(formatDisplayTime(new Date(2026, 0, 5, 9, 3, 7)), "2026-01-05 09:03:07");
});

test("header lists target, scanners and triage state", () => {
  const html = render();

  assert.ok(html.startsWith("<!DOCTYPE html>\n"));
  assert.ok(html.includes("<p>Generated: 2026-01-05 09:03:07</p>"));
  assert.ok(html.includes("<p>Target: app</p>"));
  assert.ok(html.includes("<p>Scanners: semgrep (0), bandit (skipped)</p>"));
  assert.ok(html.includes("<p>LLM triage: skipped</p>"));
  assert.ok(html.includes('<body data-items-per-page="25">'));
});

test("summary buttons carry counts and filter attributes", () => {
  const html = render([makeFinding({ severity: "high" }), makeFinding({ severity: "high", line: 11 })]);

  assert.ok(html.includes('<button type="button" class="stat high" data-severity="high"><h3>2</h3><p>High</p></button>'));
  assert.ok(html.includes('<button type="button" class="stat info" data-severity="info"><h3>0</h3><p>Info</p></button>'));
});

test("finding cards escape scanner text", () => {
  const finding = makeFinding({
    title: '<script>alert("x")</script>',
    message: "uses <b>eval</b>",
    snippet: "eval(a < b)",
    severity: "critical"
  });
  const html = render([finding]);

  assert.ok(html.includes(`<div class="finding critical" data-severity="critical" id="finding-${finding.id}">`));
  assert.ok(html.includes("<h3>1. &lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</h3>"));
  assert.ok(html.includes("<p>uses &lt;b&gt;eval&lt;/b&gt;</p>"));
  assert.ok(
    html.includes('<pre class="code"><span class="line flagged"><span class="line-number">10</span>eval(a &lt; b)</span></pre>')
  );
  assert.ok(html.includes('<p class="location">File: app/main.py:10 | Tool: semgrep</p>'));
});

test("code contexts replace the scanner snippet", () => {
  const finding = makeFinding();
  const contexts = new Map<string, CodeContext>([
    [
      finding.id,
      {
        source: "file",
        lines: [
          { lineNumber: 9, text: "user_input = read()", highlight: false },
          { lineNumber: 10, text: "eval(user_input)", highlight: true }
        ]
      }
    ]
  ]);
  const html = render([finding], META, contexts);

  assert.ok(
    html.includes(
      '<pre class="code"><span class="line"><span class="line-number">9</span>user_input = read()</span>' +
        '<span class="line flagged"><span class="line-number">10</span>eval(user_input)</span></pre>'
    )
  );
});

test("analyzed triage shows impact, likelihood and severity change", () => {
  const finding = makeFinding({
    severity: "critical",
    triage: {
      status: "analyzed",
      exploitability: 4,
      impact: "Remote code execution",
      falsePositive: "low",
      remediation: "Use ast.literal_eval",
      priority: "critical",
      originalSeverity: "medium"
    }
  });
  const meta: ReportMeta = {
    ...META,
    triage: { enabled: true, provider: "lmstudio", model: "local-model", analyzed: 1 }
  };
  const html = render([finding], meta);

  assert.ok(html.includes("<p>LLM triage: lmstudio / local-model, 1 analyzed</p>"));
  assert.ok(html.includes("<h4>Impact</h4>\n  <p>Remote code execution</p>"));
  assert.ok(html.includes("<h4>Exploitability</h4>\n  <p>4/5</p>"));
  assert.ok(html.includes('<p class="meta">False positive likelihood: LOW</p>'));
  assert.ok(html.includes('<p class="meta">Severity adjusted from MEDIUM to CRITICAL</p>'));
  assert.ok(html.includes("<h4>Remediation</h4>\n    <p>Use ast.literal_eval</p>"));
});

test("failed triage is shown as an error block", () => {
  const html = render([
    makeFinding({ triage: { status: "error", error: "skipped: endpoint unreachable" } }),
    makeFinding({ line: 11, triage: { status: "unparsed", rawResponse: "nope" } })
  ]);

  assert.ok(html.includes('<div class="triage-error">\n    <h4>LLM Analysis</h4>\n    <p>skipped: endpoint unreachable</p>'));
  assert.ok(html.includes("<p>The model response could not be parsed</p>"));
});

test("inline assets are embedded safely", () => {
  const html = render();

  assert.ok(html.includes("<style>\nbody { margin: 0; }\n</style>"));
  assert.ok(html.includes('<script>\nvar closing = "<\\/script>";\n</script>'));
});

test("an empty report still renders", () => {
  const html = render([]);

  assert.ok(html.includes("<p>No findings.</p>"));
  assert.ok(html.includes('<button type="button" class="stat critical" data-severity="critical"><h3>0</h3><p>Critical</p></button>'));
});

test("loadReportAssets reads the bundled stylesheet and script", async () => {
  const assets = await loadReportAssets();

  assert.ok(assets.css.includes(".finding {"));
  assert.ok(assets.script.includes('document.body.getAttribute("data-items-per-page")'));
});
