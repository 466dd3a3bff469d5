export type ScanProgressPhase = "static_scanners" | "triage" | "report";

export type ScanProgressEvent = {
  phase: ScanProgressPhase;
  current: number;
  total: number;
  message?: string;
};

export type ScanProgressHandler = (event: ScanProgressEvent) => void;
