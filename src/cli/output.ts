/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

import type { HostFile, TagIndexStats } from '../shared/types';
import type { ConfigWarning } from '../config';

function useColor(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR || process.env.TERM === 'dumb') return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldGreen: `${ESC}1;32m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  dim: (t: string) => wrap(codes.dim, t),
  boldGreen: (t: string) => wrap(codes.boldGreen, t),
};

export interface BuildSummary {
  stats: TagIndexStats;
  generatedPath: string | null;
  artifact: HostFile | null;
  warnings: readonly ConfigWarning[];
}

export interface TagCount {
  name: string;
  count: number;
}

export function formatWarnings(warnings: readonly ConfigWarning[]): string[] {
  return warnings.map((w) => `  ${color.yellow('Warning')} (${w.field}): ${w.message}`);
}

export function formatBuildResults(summary: BuildSummary): string {
  const lines: string[] = [];

  lines.push('doctags: build');
  lines.push(...formatWarnings(summary.warnings));
  lines.push(`  Pages scanned: ${summary.stats.pagesScanned}`);
  lines.push(`  Pages with tags: ${summary.stats.pagesWithTags}`);
  lines.push(`  Tags: ${summary.stats.totalTags}`);
  lines.push('');

  if (summary.generatedPath) {
    lines.push(`  Generated: ${color.cyan(summary.generatedPath)}`);
  } else {
    lines.push(`  Generated: ${color.dim('skipped (tags_create_target is false)')}`);
  }

  if (summary.artifact) {
    lines.push(`  Added to build: ${color.cyan(`${summary.artifact.destDir}/${summary.artifact.srcPath}`)}`);
  }

  return lines.join('\n');
}

export function formatTagList(tags: readonly TagCount[]): string {
  if (tags.length === 0) {
    return 'No tags found.';
  }

  const width = Math.max(...tags.map((t) => t.name.length));
  const lines = tags.map((t) => `  ${color.cyan(t.name.padEnd(width))}  ${t.count} page${t.count !== 1 ? 's' : ''}`);
  return [`${tags.length} tag${tags.length !== 1 ? 's' : ''}:`, ...lines].join('\n');
}
