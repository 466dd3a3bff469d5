import path from "node:path";
import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import type { ConfigOverrides, SecReviewConfig } from "../config/loadConfig.js";
import { loadConfig } from "../config/loadConfig.js";
import { TargetNotFoundError } from "../errors/scanner.errors.js";
import { discoverFiles, hasPythonSources } from "../fs/discover.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { ChatCompletionFn } from "../providers/llm.js";
import { createChatCompletion } from "../providers/llm.js";
import { collectCodeContexts } from "../report/codeContext.js";
import type { ReportAssets } from "../report/htmlReport.js";
import { loadReportAssets, renderHtmlReport } from "../report/htmlReport.js";
import type { JsonReport, ReportMeta } from "../report/jsonReport.js";
import { buildJsonReport, serializeJsonReport } from "../report/jsonReport.js";
import { createPromptTranscript } from "../triage/transcript.js";
import { sortFindings, triageFindings } from "../triage/triage.js";
import type { Finding, ScanOutputPaths, ScanResult, ScannerRun } from "../types.js";
import { normalizeFindings } from "./dedupeKey.js";
import { createScanOutputDir, formatScanTimestamp } from "./outputDir.js";
import type { ScanProgressHandler } from "./progress.js";
import type { StaticScannerDeps } from "./staticScanners.js";
import { runStaticScanners, scopeExcludes, summarizeScannerRuns } from "./staticScanners.js";

export type ScannerRunner = (config: SecReviewConfig, target: string, deps: StaticScannerDeps) => Promise<ScannerRun[]>;

export interface RunScanDeps {
  runScanners?: ScannerRunner;
  chat?: ChatCompletionFn;
  now?: () => Date;
  assets?: ReportAssets;
}

export interface RunScanOptions {
  workspaceRoot: string;
  target?: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
  skipLlm?: boolean;
  // Skips loadConfig when the caller already resolved it.
  config?: SecReviewConfig;
  logger?: Logger;
  onProgress?: ScanProgressHandler;
  deps?: RunScanDeps;
}

export interface RunScanResult extends ScanResult {
  report: JsonReport;
}

// Scanners run from the workspace root, so a relative target keeps report paths relative too.
function scannerTarget(workspaceRoot: string, absTarget: string): string {
  const relative = path.relative(workspaceRoot, absTarget);
  if (!relative) return ".";
  if (relative.startsWith("..") || path.isAbsolute(relative)) return absTarget;
  return relative;
}

export async function runScan(options: RunScanOptions): Promise<RunScanResult> {
  const deps = options.deps ?? {};
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const log = options.logger ?? noopLogger;
  const progress = options.onProgress;
  const skipLlm = Boolean(options.skipLlm);

  const config =
    options.config ??
    (await loadConfig({
      workspaceRoot: options.workspaceRoot,
      configPath: options.configPath,
      overrides: options.overrides,
      requireLlm: !skipLlm
    }));

  const requestedTarget = options.target ?? ".";
  const absTarget = path.resolve(config.workspaceRoot, requestedTarget);
  if (!existsSync(absTarget)) {
    throw new TargetNotFoundError(requestedTarget);
  }

  const discovered = await discoverFiles({ target: absTarget, exclude: scopeExcludes(config, absTarget) });
  log.debug(`Discovered ${discovered.files.length} files in scope.`, {
    extensions: Object.fromEntries(discovered.byExtension)
  });

  progress?.({ phase: "static_scanners", current: 0, total: 1 });
  const runScanners = deps.runScanners ?? runStaticScanners;
  const runs = await runScanners(config, scannerTarget(config.workspaceRoot, absTarget), {
    logger: log,
    hasPythonSources: hasPythonSources(discovered)
  });
  progress?.({ phase: "static_scanners", current: 1, total: 1 });
  log.info(`Scanners: ${summarizeScannerRuns(runs)}`);

  const rawFindingCount = runs.reduce((sum, run) => sum + run.findings.length, 0);
  let findings: Finding[] = normalizeFindings(...runs.map((run) => run.findings));
  log.info(`Total unique findings: ${findings.length}`, { raw: rawFindingCount, unique: findings.length });

  const meta: ReportMeta = {
    scanId: formatScanTimestamp(startedAt),
    generatedAt: startedAt,
    target: requestedTarget,
    scanners: runs,
    triage: {
      enabled: !skipLlm,
      provider: skipLlm ? null : config.llm.provider,
      model: skipLlm ? null : config.llm.model,
      analyzed: 0
    }
  };

  const finish = (output: ScanOutputPaths | null, triaged: number): RunScanResult => {
    const report = buildJsonReport(findings, { ...meta, triage: { ...meta.triage, analyzed: triaged } });
    return {
      target: requestedTarget,
      findings,
      scanners: runs,
      scannedFiles: discovered.files.length,
      rawFindingCount,
      triaged,
      output,
      durationMs: now().getTime() - startedAt.getTime(),
      report
    };
  };

  if (!findings.length) {
    log.info("No findings.");
    return finish(null, 0);
  }

  const output = await createScanOutputDir(config.reportsDir, absTarget, startedAt, !skipLlm);

  let triaged = 0;
  if (skipLlm) {
    log.info("Skipping LLM triage.");
    findings = sortFindings(findings);
  } else {
    const outcome = await triageFindings(findings, {
      chat: deps.chat ?? createChatCompletion(config, { logger: log }),
      keywords: config.triage,
      topK: config.llm.topK,
      snippetChars: config.triage.snippetChars,
      transcript: createPromptTranscript(output.promptLog, now),
      logger: log,
      label: config.llm.provider,
      onProgress: (current, total, finding) =>
        progress?.({ phase: "triage", current, total, message: finding.title })
    });
    findings = outcome.findings;
    triaged = outcome.analyzed;
  }

  progress?.({ phase: "report", current: 0, total: 2 });
  const result = finish(output, triaged);
  await writeFile(output.findingsJson, serializeJsonReport(result.report), "utf-8");
  log.info(`JSON report saved: ${output.findingsJson}`);
  progress?.({ phase: "report", current: 1, total: 2 });

  const contexts = await collectCodeContexts(findings, config.report.codeContextLines, config.workspaceRoot);
  const html = renderHtmlReport(findings, { ...meta, triage: result.report.triage }, {
    itemsPerPage: config.report.itemsPerPage,
    assets: deps.assets ?? (await loadReportAssets()),
    contexts
  });
  await writeFile(output.htmlReport, html, "utf-8");
  log.info(`HTML report saved: ${output.htmlReport}`);
  progress?.({ phase: "report", current: 2, total: 2 });

  return { ...result, durationMs: now().getTime() - startedAt.getTime() };
}
