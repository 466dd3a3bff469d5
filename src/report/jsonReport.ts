import type { LLMProvider } from "../config/loadConfig.js";
import type { Finding, ScannerRun, ScannerRunStatus, ScannerTool, Severity } from "../types.js";

export interface ReportTriageMeta {
  enabled: boolean;
  provider: LLMProvider | null;
  model: string | null;
  analyzed: number;
}

export interface ReportMeta {
  scanId: string;
  generatedAt: Date;
  target: string;
  scanners: ScannerRun[];
  triage: ReportTriageMeta;
}

export interface ScannerRunSummary {
  tool: ScannerTool;
  status: ScannerRunStatus;
  findings: number;
  durationMs: number;
  message?: string;
}

export interface JsonReport {
  scanId: string;
  timestamp: string;
  target: string;
  totalFindings: number;
  summary: Record<Severity, number>;
  scanners: ScannerRunSummary[];
  triage: ReportTriageMeta;
  findings: Finding[];
}

export function countBySeverity(findings: Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

export function summarizeScannerRun(run: ScannerRun): ScannerRunSummary {
  return {
    tool: run.tool,
    status: run.status,
    findings: run.findings.length,
    durationMs: run.durationMs,
    ...(run.message ? { message: run.message } : {})
  };
}

export function buildJsonReport(findings: Finding[], meta: ReportMeta): JsonReport {
  return {
    scanId: meta.scanId,
    timestamp: meta.generatedAt.toISOString(),
    target: meta.target,
    totalFindings: findings.length,
    summary: countBySeverity(findings),
    scanners: meta.scanners.map(summarizeScannerRun),
    triage: meta.triage,
    findings
  };
}

export function serializeJsonReport(report: JsonReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
