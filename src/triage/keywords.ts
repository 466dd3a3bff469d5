import type { Finding } from "../types.js";

export type KeywordEscalation = "critical" | "high";

export interface SeverityKeywords {
  criticalKeywords: string[];
  highKeywords: string[];
}

export interface EscalationResult {
  findings: Finding[];
  critical: Finding[];
  high: Finding[];
  rest: Finding[];
}

function mentionsAny(message: string, keywords: string[]): boolean {
  const haystack = message.toLowerCase();
  return keywords.some((keyword) => {
    const needle = keyword.trim().toLowerCase();
    return needle.length > 0 && haystack.includes(needle);
  });
}

export function keywordEscalation(message: string, keywords: SeverityKeywords): KeywordEscalation | null {
  if (mentionsAny(message, keywords.criticalKeywords)) return "critical";
  if (mentionsAny(message, keywords.highKeywords)) return "high";
  return null;
}

/**
 * Raises the severity of findings whose message names a well-known
 * vulnerability class. Matching is a plain substring test, so "rce" also
 * matches inside longer words.
 */
export function applyKeywordEscalation(findings: Finding[], keywords: SeverityKeywords): EscalationResult {
  const result: EscalationResult = { findings: [], critical: [], high: [], rest: [] };
  for (const finding of findings) {
    const escalation = keywordEscalation(finding.message, keywords);
    const next = escalation ? { ...finding, severity: escalation } : finding;
    result.findings.push(next);
    if (escalation === "critical") result.critical.push(next);
    else if (escalation === "high") result.high.push(next);
    else result.rest.push(next);
  }
  return result;
}

// topK of -1 sends every finding, in scan order.
export function selectTriageCandidates(escalated: EscalationResult, topK: number): Finding[] {
  if (topK === -1) return [...escalated.findings];
  return [...escalated.critical, ...escalated.high, ...escalated.rest].slice(0, Math.max(0, topK));
}
