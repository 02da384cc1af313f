import fs from 'fs';
import path from 'path';

const SKIPPED_DIRS = new Set(['node_modules', 'vendor']);

/**
 * List every file under `docsDir` as a POSIX path relative to it, sorted.
 * Hidden entries and dependency folders are skipped.
 */
export function walkDocs(docsDir: string): string[] {
  return walkDir(docsDir, '').sort();
}

export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

function walkDir(root: string, dir: string): string[] {
  const results: string[] = [];
  const entries = fs.readdirSync(path.join(root, dir), { withFileTypes: true });

  for (const entry of entries) {
    if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue;
    const relPath = dir ? `${dir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      results.push(...walkDir(root, relPath));
    } else if (entry.isFile()) {
      results.push(relPath);
    }
  }

  return results;
}
