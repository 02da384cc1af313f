/**
 * Front-matter extraction for markdown pages.
 *
 * A page carries front matter when two lines consisting only of `---`
 * appear in it. Everything between the first and second delimiter is the
 * YAML block; the first non-blank line after the second delimiter may be
 * an H1 heading used as a fallback title. The body is never parsed.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { DocTagsError, type PageMetadata } from '../shared/types';

export const UNTITLED = 'Untitled';

const DELIMITER = '---';
const HEADING_PREFIX = '# ';

type ScanState = 'BeforeBlock' | 'InBlock' | 'TitleCheck' | 'Done';

export interface FrontMatterScan {
  /** True once the closing delimiter has been seen. */
  found: boolean;
  block: string;
  /** Text of an H1 directly following the block, if any. */
  headingTitle: string | null;
}

/**
 * Walk the lines of a page and capture its front-matter block.
 */
export function scanFrontMatter(text: string): FrontMatterScan {
  const captured: string[] = [];
  let headingTitle: string | null = null;
  let state: ScanState = 'BeforeBlock';

  for (const rawLine of text.split('\n')) {
    if (state === 'Done') break;

    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();

    switch (state) {
      case 'BeforeBlock':
        if (trimmed === DELIMITER) state = 'InBlock';
        break;

      case 'InBlock':
        if (trimmed === DELIMITER) {
          state = 'TitleCheck';
        } else {
          captured.push(line);
        }
        break;

      case 'TitleCheck':
        if (trimmed === '') break;
        if (trimmed.startsWith(HEADING_PREFIX)) {
          headingTitle = trimmed.slice(HEADING_PREFIX.length).trim() || null;
        }
        state = 'Done';
        break;
    }
  }

  const found = state === 'TitleCheck' || state === 'Done';
  return { found, block: found ? captured.join('\n') : '', headingTitle };
}

/**
 * Parse a captured block as a YAML mapping.
 * Comment-only blocks give an empty mapping; anything else that is not a
 * mapping is malformed.
 */
export function parseFrontMatter(block: string, filename: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    // Repeated keys keep the last value.
    parsed = parseYaml(block, { uniqueKeys: false });
  } catch (err) {
    throw new DocTagsError({
      code: 'E101',
      message: `Malformed front matter in ${filename}: ${err instanceof Error ? err.message : String(err)}`,
      context: { file: filename },
      cause: err,
    });
  }

  if (parsed === null || parsed === undefined) return {};

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new DocTagsError({
      code: 'E101',
      message: `Malformed front matter in ${filename}: expected a mapping, got ${Array.isArray(parsed) ? 'a list' : typeof parsed}`,
      context: { file: filename },
    });
  }

  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Title from a file name: `my-page_notes.md` → `My page notes`.
 * Only all-lowercase names are capitalized; mixed case is kept.
 */
export function deriveTitle(filename: string): string {
  const base = path.posix.basename(filename.replace(/\\/g, '/'));
  const stem = base.replace(/\.(md|markdown)$/i, '');
  const title = stem.replace(/[-_]/g, ' ');
  if (title === '') return UNTITLED;
  if (title.toLowerCase() === title) {
    return title.charAt(0).toUpperCase() + title.slice(1);
  }
  return title;
}

/**
 * Read a page and build its metadata.
 * Returns null when the page has no front-matter block, or a blank one.
 */
export function extractMetadata(filename: string, docsDir: string): PageMetadata | null {
  const fullPath = path.join(docsDir, filename);

  let text: string;
  try {
    text = fs.readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new DocTagsError({
      code: 'E102',
      message: `Cannot read ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
      context: { file: filename, path: fullPath },
      cause: err,
    });
  }

  const scan = scanFrontMatter(text);
  if (!scan.found || scan.block.trim() === '') return null;

  const raw = parseFrontMatter(scan.block, filename);
  return toPageMetadata(raw, filename, scan.headingTitle);
}

export function toPageMetadata(
  raw: Record<string, unknown>,
  filename: string,
  headingTitle: string | null,
): PageMetadata {
  const { title: rawTitle, tags: rawTags, year: rawYear, filename: _sourceName, ...extra } = raw;

  const meta: PageMetadata = {
    filename,
    title: resolveTitle(rawTitle, headingTitle, filename),
    extra,
  };

  const tags = normalizeTags(rawTags);
  if (tags) meta.tags = tags;

  const year = normalizeYear(rawYear);
  if (year !== undefined) {
    meta.year = year;
  } else if (rawYear !== undefined) {
    meta.extra = { ...extra, year: rawYear };
  }

  return meta;
}

function resolveTitle(rawTitle: unknown, headingTitle: string | null, filename: string): string {
  if (rawTitle !== undefined && rawTitle !== null && String(rawTitle) !== '') {
    return String(rawTitle);
  }
  return headingTitle ?? deriveTitle(filename);
}

/** Scalars become strings; nulls and nested values are dropped. */
function normalizeTags(rawTags: unknown): string[] | undefined {
  if (!Array.isArray(rawTags)) return undefined;
  const tags: string[] = [];
  for (const tag of rawTags) {
    if (typeof tag === 'string') {
      tags.push(tag);
    } else if (typeof tag === 'number' || typeof tag === 'boolean') {
      tags.push(String(tag));
    }
  }
  return tags;
}

function normalizeYear(rawYear: unknown): number | undefined {
  if (typeof rawYear === 'number' && Number.isFinite(rawYear)) return rawYear;
  if (typeof rawYear === 'string' && rawYear.trim() !== '') {
    const n = Number(rawYear);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}
