import crypto from "node:crypto";
import type { Finding } from "../types.js";

export type FindingIdentityInput = Pick<Finding, "filepath" | "line" | "title">;

export function normalizeFilepath(value: string): string {
  return value
    .replace(/\\/g, "/")
    .trim()
    .replace(/^(\.\/)+/, "")
    .replace(/\/{2,}/g, "/");
}

function normalizeKeyPart(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

export function findingDedupeKey(finding: FindingIdentityInput): string {
  const line = Number.isFinite(finding.line) ? Math.max(0, Math.trunc(finding.line)) : 0;
  return `${normalizeFilepath(finding.filepath)}:${line}:${normalizeKeyPart(finding.title)}`;
}

export function findingId(finding: FindingIdentityInput): string {
  return crypto.createHash("sha256").update(findingDedupeKey(finding)).digest("hex").slice(0, 16);
}

/**
 * Keeps the first finding for each location + rule identity. Input order is
 * preserved, so callers control which tool wins a collision.
 */
export function dedupeFindings(findings: Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = findingDedupeKey(finding);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }
  return unique;
}

export function normalizeFindings(...groups: Finding[][]): Finding[] {
  return dedupeFindings(groups.flat());
}
