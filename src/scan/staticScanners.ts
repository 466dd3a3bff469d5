import path from "node:path";
import { existsSync, statSync } from "node:fs";
import { spawn } from "node:child_process";
import type { BanditLevel, SecReviewConfig } from "../config/loadConfig.js";
import {
  ScannerExecutionError,
  ScannerNotFoundError,
  ScannerTimeoutError,
  ScannersUnavailableError
} from "../errors/scanner.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { Finding, ScannerRun, ScannerTool } from "../types.js";
import { parseBanditOutput, parseSemgrepOutput } from "./scannerOutput.js";

export interface SpawnResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface SpawnOptions {
  cwd: string;
  timeoutMs: number;
}

export type SpawnCaptureFn = (command: string, args: string[], options: SpawnOptions) => Promise<SpawnResult>;

export type ToolResolver = (tool: ScannerTool, override?: string | null) => string | null;

export interface StaticScannerDeps {
  logger?: Logger;
  spawnCapture?: SpawnCaptureFn;
  resolveToolPath?: ToolResolver;
  // Set when discovery already knows whether the target holds Python sources.
  hasPythonSources?: boolean;
  now?: () => number;
}

const ACCEPTED_EXIT_CODES = new Set([0, 1]);

const BANDIT_LEVEL_FLAGS: Record<BanditLevel, string> = {
  low: "-l",
  medium: "-ll",
  high: "-lll"
};

function isExecutable(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function findOnPath(command: string): string | null {
  const pathEnv = process.env.PATH || "";
  const parts = pathEnv.split(path.delimiter).filter(Boolean);
  const extList = process.platform === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];

  for (const dir of parts) {
    for (const ext of extList) {
      const candidate = path.join(dir, `${command}${ext}`);
      if (isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export function resolveToolPath(tool: ScannerTool, override?: string | null): string | null {
  if (override) {
    return isExecutable(override) ? override : findOnPath(override);
  }
  return findOnPath(tool);
}

export async function spawnCapture(command: string, args: string[], options: SpawnOptions): Promise<SpawnResult> {
  return await new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], cwd: options.cwd });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, options.timeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new ScannerTimeoutError(path.basename(command), options.timeoutMs));
        return;
      }
      resolve({ code, stdout, stderr });
    });
  });
}

/**
 * Configured excludes, plus the reports directory when it lies inside the
 * target. Patterns are relative to the target.
 */
export function scopeExcludes(config: SecReviewConfig, target: string): string[] {
  const excludes = [...config.scanners.exclude];
  const absTarget = path.resolve(config.workspaceRoot, target);
  const relative = path.relative(absTarget, path.resolve(config.workspaceRoot, config.reportsDir));
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) return excludes;
  const pattern = `${relative.split(path.sep).join("/")}/**`;
  if (!excludes.includes(pattern)) excludes.push(pattern);
  return excludes;
}

// Bandit's -x takes paths, not globs anchored with **.
export function banditExcludePaths(patterns: string[]): string[] {
  const paths = patterns
    .map((pattern) => pattern.replace(/^(\*\*\/)+/, "").replace(/(\/\*\*)+$/, "").replace(/\/+$/, ""))
    .filter((value) => value && value !== "**");
  return [...new Set(paths)];
}

export function buildSemgrepArgs(config: SecReviewConfig, target: string): string[] {
  const args = [
    "scan",
    "--json",
    "--quiet",
    "--disable-version-check",
    "--timeout",
    String(config.scanners.timeoutSeconds)
  ];
  for (const cfg of config.scanners.semgrep.configs) {
    args.push("--config", cfg);
  }
  for (const exclude of scopeExcludes(config, target)) {
    args.push("--exclude", exclude);
  }
  args.push(target);
  return args;
}

export function buildBanditArgs(config: SecReviewConfig, target: string): string[] {
  const args = ["-f", "json", "-q", BANDIT_LEVEL_FLAGS[config.scanners.bandit.level]];
  let recursive = true;
  try {
    recursive = !statSync(path.resolve(config.workspaceRoot, target)).isFile();
  } catch {
    recursive = true;
  }
  if (recursive) args.unshift("-r");
  const excluded = banditExcludePaths(scopeExcludes(config, target));
  if (excluded.length) args.push("-x", excluded.join(","));
  args.push(target);
  return args;
}

interface ToolSpec {
  tool: ScannerTool;
  enabled: boolean;
  override: string | null;
  buildArgs: (config: SecReviewConfig, target: string) => string[];
  parse: (stdout: string) => Finding[];
}

function toolSpecs(config: SecReviewConfig): ToolSpec[] {
  return [
    {
      tool: "semgrep",
      enabled: config.scanners.semgrep.enabled,
      override: config.scanners.semgrep.path,
      buildArgs: buildSemgrepArgs,
      parse: parseSemgrepOutput
    },
    {
      tool: "bandit",
      enabled: config.scanners.bandit.enabled,
      override: config.scanners.bandit.path,
      buildArgs: buildBanditArgs,
      parse: parseBanditOutput
    }
  ];
}

async function runTool(
  scanner: ToolSpec,
  toolPath: string,
  config: SecReviewConfig,
  target: string,
  spawnFn: SpawnCaptureFn
): Promise<Finding[]> {
  const result = await spawnFn(toolPath, scanner.buildArgs(config, target), {
    cwd: config.workspaceRoot,
    timeoutMs: config.scanners.timeoutSeconds * 1000
  });
  if (result.code === null || !ACCEPTED_EXIT_CODES.has(result.code)) {
    throw new ScannerExecutionError(scanner.tool, result.code, result.stderr);
  }
  return scanner.parse(result.stdout);
}

/**
 * Runs each enabled scanner in turn. A tool that is missing or fails is
 * reported in its ScannerRun and the remaining tools still run.
 */
export async function runStaticScanners(
  config: SecReviewConfig,
  target: string,
  deps: StaticScannerDeps = {}
): Promise<ScannerRun[]> {
  const log = deps.logger ?? noopLogger;
  const spawnFn = deps.spawnCapture ?? spawnCapture;
  const resolveTool = deps.resolveToolPath ?? resolveToolPath;
  const now = deps.now ?? Date.now;
  const runs: ScannerRun[] = [];

  for (const scanner of toolSpecs(config)) {
    const started = now();
    if (!scanner.enabled) {
      log.info(`Skipping ${scanner.tool} (disabled in config).`);
      runs.push({ tool: scanner.tool, status: "skipped", findings: [], durationMs: 0, message: "disabled" });
      continue;
    }
    if (scanner.tool === "bandit" && deps.hasPythonSources === false) {
      log.info("Skipping bandit (no Python sources in target).");
      runs.push({ tool: scanner.tool, status: "skipped", findings: [], durationMs: 0, message: "no Python sources" });
      continue;
    }

    const toolPath = resolveTool(scanner.tool, scanner.override);
    if (!toolPath) {
      const error = new ScannerNotFoundError(scanner.tool);
      log.warn(`WARNING - ${error.message}`);
      runs.push({ tool: scanner.tool, status: "skipped", findings: [], durationMs: 0, message: error.message });
      continue;
    }

    log.info(`Running ${scanner.tool}...`);
    try {
      const findings = await runTool(scanner, toolPath, config, target, spawnFn);
      log.info(`Found ${findings.length} ${scanner.tool} findings`, { tool: scanner.tool, count: findings.length });
      runs.push({ tool: scanner.tool, status: "ok", findings, durationMs: now() - started });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`WARNING - ${scanner.tool}: ${message}`);
      runs.push({ tool: scanner.tool, status: "failed", findings: [], durationMs: now() - started, message });
    }
  }

  if (!runs.some((run) => run.status === "ok")) {
    throw new ScannersUnavailableError(
      runs.map((run) => `${run.tool}: ${run.message ?? run.status}.`)
    );
  }

  return runs;
}

export function summarizeScannerRuns(runs: ScannerRun[]): string {
  return runs
    .map((run) => {
      if (run.status === "ok") return `${run.tool}: ${run.findings.length}`;
      return `${run.tool}: ${run.status}${run.message ? ` (${run.message})` : ""}`;
    })
    .join(", ");
}
