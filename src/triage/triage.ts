import { ProviderRequestFailedError } from "../errors/provider.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { ChatCompletionFn } from "../providers/llm.js";
import { SEVERITIES } from "../types.js";
import type { Finding, Severity, TriageAnnotation } from "../types.js";
import type { SeverityKeywords } from "./keywords.js";
import { applyKeywordEscalation, selectTriageCandidates } from "./keywords.js";
import { DEFAULT_SNIPPET_CHARS, applyTriageVerdict, buildTriageMessages, parseTriageResponse } from "./prompt.js";
import type { PromptTranscript } from "./transcript.js";
import { noopTranscript } from "./transcript.js";

export const UNREACHABLE_SKIP_MESSAGE = "skipped: endpoint unreachable";

export interface TriageOptions {
  chat: ChatCompletionFn;
  keywords: SeverityKeywords;
  topK: number;
  snippetChars?: number;
  transcript?: PromptTranscript;
  logger?: Logger;
  // Shown in log lines, e.g. the provider id.
  label?: string;
  onProgress?: (done: number, total: number, finding: Finding) => void;
}

export interface TriageOutcome {
  findings: Finding[];
  candidates: number;
  analyzed: number;
  failed: number;
  aborted: boolean;
}

const SEVERITY_RANK = new Map<Severity, number>(SEVERITIES.map((severity, index) => [severity, index]));

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK.get(severity) ?? SEVERITIES.length;
}

export function sortFindings(findings: Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    const bySeverity = severityRank(a.severity) - severityRank(b.severity);
    if (bySeverity !== 0) return bySeverity;
    if (a.filepath === b.filepath) return 0;
    return a.filepath < b.filepath ? -1 : 1;
  });
}

/**
 * Escalates findings by keyword, asks the model about the selected ones one
 * at a time, and returns every finding sorted by severity then path. Once the
 * endpoint is unreachable no further calls are made.
 */
export async function triageFindings(findings: Finding[], options: TriageOptions): Promise<TriageOutcome> {
  const log = options.logger ?? noopLogger;
  const transcript = options.transcript ?? noopTranscript;
  const snippetChars = options.snippetChars ?? DEFAULT_SNIPPET_CHARS;
  const label = options.label ? ` (${options.label})` : "";

  if (findings.length === 0) {
    return { findings: [], candidates: 0, analyzed: 0, failed: 0, aborted: false };
  }

  const escalated = applyKeywordEscalation(findings, options.keywords);
  const candidates = selectTriageCandidates(escalated, options.topK);
  const updates = new Map<Finding, Finding>();
  let aborted = false;
  let analyzed = 0;
  let failed = 0;

  log.info(`Analyzing ${candidates.length} findings with LLM${label}...`, {
    candidates: candidates.length,
    escalatedCritical: escalated.critical.length,
    escalatedHigh: escalated.high.length
  });

  for (const [index, finding] of candidates.entries()) {
    let annotation: TriageAnnotation;
    if (aborted) {
      annotation = { status: "error", error: UNREACHABLE_SKIP_MESSAGE };
    } else {
      log.info(`Analyzing ${index + 1}/${candidates.length}: ${finding.title}`);
      const messages = buildTriageMessages(finding, snippetChars);
      const userPrompt = messages.find((message) => message.role === "user")?.content ?? "";
      await transcript.recordPrompt(finding, userPrompt);
      try {
        const response = await options.chat(messages);
        await transcript.recordResponse(response);
        annotation = parseTriageResponse(response, finding.severity);
        if (annotation.status === "unparsed") {
          log.warn(
            annotation.parseError
              ? `Warning: JSON parse error: ${annotation.parseError}`
              : "Warning: Could not extract JSON from LLM response",
            { findingId: finding.id }
          );
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        await transcript.recordResponse(`Error: ${message}`);
        annotation = { status: "error", error: message };
        log.warn(`Warning: ${message.slice(0, 200)}`, { findingId: finding.id });
        if (err instanceof ProviderRequestFailedError) {
          aborted = true;
          log.warn("LLM endpoint unreachable; remaining findings are not triaged.");
        }
      }
    }

    if (annotation.status === "analyzed") analyzed += 1;
    else failed += 1;
    updates.set(finding, applyTriageVerdict(finding, annotation));
    options.onProgress?.(index + 1, candidates.length, finding);
  }

  const merged = escalated.findings.map((finding) => updates.get(finding) ?? finding);
  return {
    findings: sortFindings(merged),
    candidates: candidates.length,
    analyzed,
    failed,
    aborted
  };
}
