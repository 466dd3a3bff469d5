import path from "node:path";
import { readFileSync } from "node:fs";
import { stat } from "node:fs/promises";
import fg from "fast-glob";
import ignore from "ignore";

export interface DiscoverOptions {
  target: string;
  exclude: string[];
}

export interface DiscoveredFiles {
  files: string[];
  byExtension: Map<string, number>;
}

const PYTHON_EXTENSIONS = new Set([".py", ".pyw"]);

function loadGitignore(root: string): string[] {
  const gitignorePath = path.join(root, ".gitignore");
  try {
    const raw = readFileSync(gitignorePath, "utf-8");
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line && !line.startsWith("#"));
  } catch {
    return [];
  }
}

function countExtensions(files: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const file of files) {
    const ext = path.extname(file).toLowerCase();
    if (!ext) continue;
    counts.set(ext, (counts.get(ext) ?? 0) + 1);
  }
  return counts;
}

/**
 * Lists the files the scanners will see under `target`, relative to it.
 * A file target yields just its own basename.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<DiscoveredFiles> {
  const info = await stat(options.target);
  if (info.isFile()) {
    const files = [path.basename(options.target)];
    return { files, byExtension: countExtensions(files) };
  }

  const ig = ignore();
  ig.add(options.exclude);
  ig.add(loadGitignore(options.target));

  const entries = await fg(["**/*"], {
    cwd: options.target,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false
  });

  const files = entries.filter((rel) => !ig.ignores(rel)).sort();
  return { files, byExtension: countExtensions(files) };
}

export function hasPythonSources(discovered: DiscoveredFiles): boolean {
  for (const ext of PYTHON_EXTENSIONS) {
    if ((discovered.byExtension.get(ext) ?? 0) > 0) return true;
  }
  return false;
}
