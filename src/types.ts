export type Severity = "critical" | "high" | "medium" | "low" | "info";

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low", "info"];

export type ScannerTool = "semgrep" | "bandit";

export type FalsePositiveLikelihood = "low" | "medium" | "high";

export type TriageAnnotation =
  | {
      status: "analyzed";
      exploitability: number | null;
      impact: string;
      falsePositive: FalsePositiveLikelihood | null;
      remediation: string;
      priority: Severity | null;
      originalSeverity: Severity;
    }
  | {
      status: "unparsed";
      rawResponse: string;
      parseError?: string;
    }
  | {
      status: "error";
      error: string;
    };

export interface Finding {
  id: string;
  tool: ScannerTool;
  ruleId: string;
  title: string;
  severity: Severity;
  message: string;
  filepath: string;
  line: number;
  endLine: number;
  snippet: string;
  cwe: string[];
  confidence?: string;
  triage?: TriageAnnotation;
}

export type ScannerRunStatus = "ok" | "skipped" | "failed";

export interface ScannerRun {
  tool: ScannerTool;
  status: ScannerRunStatus;
  findings: Finding[];
  durationMs: number;
  message?: string;
}

export interface ScanOutputPaths {
  directory: string;
  findingsJson: string;
  htmlReport: string;
  promptLog: string | null;
}

export interface ScanResult {
  target: string;
  findings: Finding[];
  scanners: ScannerRun[];
  scannedFiles: number;
  rawFindingCount: number;
  triaged: number;
  output: ScanOutputPaths | null;
  durationMs: number;
}
