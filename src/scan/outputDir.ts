import path from "node:path";
import { mkdir } from "node:fs/promises";
import type { ScanOutputPaths } from "../types.js";

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local wall-clock time as `YYYY-MM-DD_HH-mm-ss`. */
export function formatScanTimestamp(date: Date): string {
  return [
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`,
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  ].join("_");
}

export function targetDisplayName(target: string): string {
  const trimmed = target.replace(/[\\/]+$/, "");
  const name = trimmed.split(/[\\/]/).pop() ?? "";
  if (!name || name === "." || name === "..") return "root";
  return name.replace(/[^A-Za-z0-9._-]+/g, "_");
}

export function scanFolderName(target: string, date: Date): string {
  return `${formatScanTimestamp(date)}_${targetDisplayName(target)}`;
}

export async function createScanOutputDir(
  reportsDir: string,
  target: string,
  date: Date,
  withPromptLog: boolean
): Promise<ScanOutputPaths> {
  const directory = path.join(reportsDir, scanFolderName(target, date));
  await mkdir(directory, { recursive: true });
  return {
    directory,
    findingsJson: path.join(directory, "findings.json"),
    htmlReport: path.join(directory, "report.html"),
    promptLog: withPromptLog ? path.join(directory, "llm_prompts.txt") : null
  };
}
