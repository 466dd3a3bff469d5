import type { ScannerTool } from "../types.js";

export class TargetNotFoundError extends Error {
  constructor(target: string) {
    super(`Target not found: ${target}. Provide a valid file or directory path.`);
    this.name = "TargetNotFoundError";
  }
}

export class ScannerNotFoundError extends Error {
  tool: ScannerTool;

  constructor(tool: ScannerTool) {
    super(`${tool} not found on PATH. Install it or set its path in secreview.config.json.`);
    this.name = "ScannerNotFoundError";
    this.tool = tool;
  }
}

export class ScannerExecutionError extends Error {
  tool: ScannerTool;
  exitCode: number | null;
  stderr: string;

  constructor(tool: ScannerTool, exitCode: number | null, stderr: string) {
    const detail = stderr.trim().split("\n").slice(-3).join(" ").slice(0, 500);
    super(`${tool} exited with ${exitCode ?? "no exit code"}${detail ? `: ${detail}` : ""}`);
    this.name = "ScannerExecutionError";
    this.tool = tool;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ScannerTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`${command} timed out after ${Math.round(timeoutMs / 1000)}s.`);
    this.name = "ScannerTimeoutError";
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

export class ScannerOutputParseError extends Error {
  tool: ScannerTool;

  constructor(tool: ScannerTool, message: string) {
    super(`${tool} produced invalid JSON: ${message}`);
    this.name = "ScannerOutputParseError";
    this.tool = tool;
  }
}

export class ScannersUnavailableError extends Error {
  constructor(details: string[]) {
    super(`No static scanner could run. ${details.join(" ")}`.trim());
    this.name = "ScannersUnavailableError";
  }
}
