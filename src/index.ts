export * from "./scan/runScan.js";
export * from "./scan/staticScanners.js";
export * from "./scan/scannerOutput.js";
export * from "./scan/dedupeKey.js";
export * from "./config/loadConfig.js";
export * from "./triage/triage.js";
export * from "./providers/llm.js";
export * from "./report/jsonReport.js";
export * from "./report/htmlReport.js";
export * from "./report/formatters.js";
export * from "./types.js";
