import path from "node:path";
import { readFile } from "node:fs/promises";
import type { Finding } from "../types.js";

export interface CodeLine {
  lineNumber: number;
  text: string;
  highlight: boolean;
}

export interface CodeContext {
  source: "file" | "snippet";
  lines: CodeLine[];
}

export type CodeLocation = Pick<Finding, "filepath" | "line" | "endLine" | "snippet">;

function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function snippetContext(location: CodeLocation): CodeContext {
  const snippetLines = splitLines(location.snippet);
  const first = location.line > 0 ? location.line : 1;
  const last = Math.max(location.endLine, location.line);
  return {
    source: "snippet",
    lines: snippetLines.map((text, index) => {
      const lineNumber = first + index;
      return {
        lineNumber,
        text: text.trimEnd(),
        highlight: location.line > 0 && lineNumber >= location.line && lineNumber <= last
      };
    })
  };
}

/**
 * Reads `contextLines` lines either side of the flagged line. Falls back to
 * the scanner's own snippet when the file cannot be read or the line is out
 * of range.
 */
export async function getCodeContext(location: CodeLocation, contextLines: number, root: string): Promise<CodeContext> {
  if (location.line < 1 || !location.filepath) return snippetContext(location);

  const filePath = path.isAbsolute(location.filepath) ? location.filepath : path.resolve(root, location.filepath);
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch {
    return snippetContext(location);
  }

  const fileLines = splitLines(content);
  if (location.line > fileLines.length) return snippetContext(location);

  const start = Math.max(1, location.line - contextLines);
  const end = Math.min(fileLines.length, location.line + contextLines);
  const lines: CodeLine[] = [];
  for (let lineNumber = start; lineNumber <= end; lineNumber += 1) {
    lines.push({
      lineNumber,
      text: (fileLines[lineNumber - 1] ?? "").trimEnd(),
      highlight: lineNumber === location.line
    });
  }
  return { source: "file", lines };
}

export async function collectCodeContexts(
  findings: Finding[],
  contextLines: number,
  root: string
): Promise<Map<string, CodeContext>> {
  const contexts = new Map<string, CodeContext>();
  for (const finding of findings) {
    contexts.set(finding.id, await getCodeContext(finding, contextLines, root));
  }
  return contexts;
}
