#!/usr/bin/env node
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import pc from "picocolors";
import { STATE_DIR_NAME } from "./config/defaults.js";
import type { ConfigOverrides } from "./config/loadConfig.js";
import { LLMProviderId, loadConfig } from "./config/loadConfig.js";
import type { AppLogger, Logger } from "./logging/logger.js";
import { createAppLogger, createUiLogger, noopLogger } from "./logging/logger.js";
import { formatFindingsText, formatSummaryText, hasActionableFindings } from "./report/formatters.js";
import { serializeJsonReport } from "./report/jsonReport.js";
import type { ScanProgressEvent, ScanProgressHandler, ScanProgressPhase } from "./scan/progress.js";
import { runScan } from "./scan/runScan.js";
import { resolveToolPath } from "./scan/staticScanners.js";

const program = new Command();

const TERMINAL_FINDINGS_LIMIT = 10;

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  get active(): boolean {
    return this.timer !== null;
  }

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

const PROGRESS_PHASE_LABELS: Record<ScanProgressPhase, string> = {
  static_scanners: "Static scanners",
  triage: "LLM triage",
  report: "Report"
};

const PROGRESS_PHASE_WEIGHTS: Record<ScanProgressPhase, number> = {
  static_scanners: 3,
  triage: 6,
  report: 1
};

const PROGRESS_PHASES: ScanProgressPhase[] = ["static_scanners", "triage", "report"];

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

function renderProgressBar(value: number, width = 24): string {
  const normalized = clampProgress(value);
  const filled = Math.round(normalized * width);
  const empty = Math.max(0, width - filled);
  const bar = `${"#".repeat(filled)}${"-".repeat(empty)}`;
  const percent = Math.round(normalized * 100);
  return `[${bar}] ${percent}%`;
}

function createProgressReporter(update: (message: string) => void): ScanProgressHandler {
  const fractions = new Map<ScanProgressPhase, number>();
  PROGRESS_PHASES.forEach((phase) => fractions.set(phase, 0));

  return (event: ScanProgressEvent) => {
    const total = Math.max(0, Math.trunc(event.total));
    const current = Math.max(0, Math.trunc(event.current));
    const fraction = total === 0 ? 1 : clampProgress(current / total);
    fractions.set(event.phase, fraction);
    // Earlier phases are done once a later one reports.
    const index = PROGRESS_PHASES.indexOf(event.phase);
    PROGRESS_PHASES.slice(0, index).forEach((phase) => fractions.set(phase, 1));

    const weightedTotal = PROGRESS_PHASES.reduce((sum, phase) => sum + PROGRESS_PHASE_WEIGHTS[phase], 0);
    const weightedCompleted = PROGRESS_PHASES.reduce(
      (sum, phase) => sum + PROGRESS_PHASE_WEIGHTS[phase] * (fractions.get(phase) ?? 0),
      0
    );
    const overall = weightedTotal ? weightedCompleted / weightedTotal : 0;
    const bar = renderProgressBar(overall);
    const label = PROGRESS_PHASE_LABELS[event.phase];
    const detail = total === 0 ? event.message ?? "skipped" : `${Math.min(current, total)}/${total}`;
    update(`${bar} ${label} (${detail})`);
  };
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function logCliError(logger: Logger, message: string): void {
  logger.error(`Error: ${message}`);
}

function parseTopK(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || (parsed < 1 && parsed !== -1)) {
    throw new InvalidArgumentError("Expected a positive integer, or -1 for all findings.");
  }
  return parsed;
}

async function openAppLogger(label: string): Promise<AppLogger | null> {
  try {
    return await createAppLogger({ stateDir: path.join(process.cwd(), STATE_DIR_NAME), label });
  } catch {
    return null;
  }
}

program
  .name("secreview")
  .description("Run Semgrep and Bandit, triage the findings with an LLM, and write an HTML report")
  .version("0.1.0");

program
  .command("scan [target]")
  .description("Scan a directory or file (default: current directory)")
  .option("-c, --config <path>", "Path to secreview.config.json")
  .option("--skip-llm", "Skip LLM triage; scanners and reports only")
  .option("--llm-top-k <n>", "Number of findings to triage with the LLM (-1 for all)", parseTopK)
  .addOption(
    new Option("--provider <name>", "LLM provider").choices([
      ...Object.values(LLMProviderId),
      "lm-studio",
      "claude"
    ])
  )
  .option("--model <name>", "LLM model name")
  .option("--reports-dir <path>", "Directory for report folders (default: reports)")
  .option("--json", "Print the findings.json document to stdout")
  .option("--debug", "Print debug logging")
  .action(
    async (
      target: string | undefined,
      options: {
        config?: string;
        skipLlm?: boolean;
        llmTopK?: number;
        provider?: string;
        model?: string;
        reportsDir?: string;
        json?: boolean;
        debug?: boolean;
      }
    ) => {
      const isJsonOutput = Boolean(options.json);
      const spinner = !options.debug && process.stderr.isTTY ? new Spinner(process.stderr) : null;
      const scanStart = Date.now();
      let statusMessage = "Running scan...";
      let elapsedTimer: ReturnType<typeof setInterval> | null = null;

      const appLogger = await openAppLogger("scan");
      const formatStatus = (message: string) => `${message} (elapsed ${formatDuration(Date.now() - scanStart)})`;
      const updateStatus = (message: string) => {
        statusMessage = message;
        spinner?.update(formatStatus(statusMessage));
      };
      const uiLogger = createUiLogger({
        appLogger: appLogger ?? noopLogger,
        verbose: Boolean(options.debug),
        print: (line, level) => {
          if (spinner?.active) {
            if (level === "info") {
              updateStatus(line);
              return;
            }
            spinner.stop();
            console.error(line);
            spinner.start(formatStatus(statusMessage));
            return;
          }
          if (isJsonOutput && level === "info") return;
          console.error(line);
        }
      });
      const stopSpinner = () => {
        if (elapsedTimer) {
          clearInterval(elapsedTimer);
          elapsedTimer = null;
        }
        spinner?.stop();
      };

      const overrides: ConfigOverrides = {
        provider: options.provider,
        model: options.model,
        llmTopK: options.llmTopK,
        reportsDir: options.reportsDir
      };

      try {
        if (spinner) {
          spinner.start(formatStatus(statusMessage));
          elapsedTimer = setInterval(() => spinner.update(formatStatus(statusMessage)), 1000);
        }
        const result = await runScan({
          workspaceRoot: process.cwd(),
          target: target ?? ".",
          configPath: options.config,
          overrides,
          skipLlm: Boolean(options.skipLlm),
          logger: uiLogger,
          onProgress: spinner ? createProgressReporter(updateStatus) : undefined
        });
        stopSpinner();

        if (isJsonOutput) {
          process.stdout.write(serializeJsonReport(result.report));
        } else {
          if (result.findings.length) {
            console.log(formatFindingsText(result.findings.slice(0, TERMINAL_FINDINGS_LIMIT)));
            if (result.findings.length > TERMINAL_FINDINGS_LIMIT) {
              console.log(
                pc.dim(`\n...and ${result.findings.length - TERMINAL_FINDINGS_LIMIT} more in the HTML report.`)
              );
            }
            console.log("");
          }
          console.log(
            formatSummaryText(result.findings, {
              reportPath: result.output?.htmlReport ?? null,
              findingsPath: result.output?.findingsJson ?? null
            })
          );
          console.log(`\nScan completed in ${formatDuration(result.durationMs)}.`);
        }

        process.exitCode = hasActionableFindings(result.findings) ? 1 : 0;
      } catch (err) {
        stopSpinner();
        const message = err instanceof Error ? err.message : String(err);
        logCliError(uiLogger, message);
        process.exitCode = 2;
      } finally {
        await appLogger?.close();
      }
    }
  );

program
  .command("doctor")
  .description("Show which scanners and which LLM endpoint a scan would use")
  .option("-c, --config <path>", "Path to secreview.config.json")
  .action(async (options: { config?: string }) => {
    const appLogger = await openAppLogger("doctor");
    const uiLogger = createUiLogger({ appLogger: appLogger ?? noopLogger });
    try {
      const config = await loadConfig({
        workspaceRoot: process.cwd(),
        configPath: options.config,
        requireLlm: false
      });
      const semgrep = resolveToolPath("semgrep", config.scanners.semgrep.path);
      const bandit = resolveToolPath("bandit", config.scanners.bandit.path);
      const status = (found: string | null, enabled: boolean) => {
        if (!enabled) return pc.dim("disabled");
        return found ? pc.green(found) : pc.yellow("not found");
      };
      const hosted = config.llm.provider === "openai" || config.llm.provider === "anthropic";

      console.log(`semgrep:   ${status(semgrep, config.scanners.semgrep.enabled)}`);
      console.log(`bandit:    ${status(bandit, config.scanners.bandit.enabled)}`);
      console.log(`provider:  ${config.llm.provider}`);
      console.log(`model:     ${config.llm.model}`);
      console.log(`endpoint:  ${config.llm.endpoint}`);
      if (hosted) {
        console.log(`api key:   ${config.llm.apiKey ? pc.green("set") : pc.yellow("missing")}`);
      }
      console.log(`reports:   ${config.reportsDir}`);

      const anyScanner =
        (config.scanners.semgrep.enabled && semgrep !== null) || (config.scanners.bandit.enabled && bandit !== null);
      if (!anyScanner) {
        uiLogger.warn("No static scanner is available. Install semgrep and/or bandit.");
      }
      process.exitCode = anyScanner ? 0 : 1;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logCliError(uiLogger, message);
      process.exitCode = 2;
    } finally {
      await appLogger?.close();
    }
  });

await program.parseAsync(process.argv);
