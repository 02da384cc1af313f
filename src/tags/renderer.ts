/**
 * Renders the generated tags page.
 *
 * Layout belongs entirely to the template (mustache, logic-less); this
 * module only decides the order of tags and the shape of the view.
 */

import fs from 'fs';
import path from 'path';
import Mustache from 'mustache';
import { DocTagsError, type PageMetadata, type TagIndex } from '../shared/types';

export const BUILTIN_TEMPLATE_PATH = path.resolve(__dirname, '..', '..', 'templates', 'tags.md.mustache');

export interface TagEntry {
  name: string;
  pages: readonly PageMetadata[];
}

export interface ResolvedTemplate {
  source: string;
  path: string;
  builtin: boolean;
}

export interface PageView {
  [field: string]: unknown;
  filename: string;
  title: string;
  tags: string[];
  year: number | null;
  /** Link from the generated page to this page. */
  url: string;
}

export interface TagsPageView {
  tags: Array<{ name: string; count: number; pages: PageView[] }>;
}

export interface RenderOptions {
  /** Folder the generated page is published under, relative to the site root. */
  targetFolder?: string;
}

/**
 * Tags ordered case-insensitively. Tags equal ignoring case keep their
 * index order, so `x` seen before `X` renders first.
 */
export function sortTagEntries(index: TagIndex): TagEntry[] {
  const entries: TagEntry[] = Array.from(index, ([name, pages]) => ({ name, pages }));
  return entries.sort((a, b) => {
    const ka = a.name.toLowerCase();
    const kb = b.name.toLowerCase();
    if (ka < kb) return -1;
    if (ka > kb) return 1;
    return 0;
  });
}

export function resolveTemplate(templatePath?: string): ResolvedTemplate {
  const file = templatePath ?? BUILTIN_TEMPLATE_PATH;
  try {
    return {
      source: fs.readFileSync(file, 'utf-8'),
      path: file,
      builtin: templatePath === undefined,
    };
  } catch (err) {
    throw new DocTagsError({
      code: 'E201',
      message: `Cannot load tags template ${file}: ${err instanceof Error ? err.message : String(err)}`,
      context: { path: file },
      cause: err,
    });
  }
}

/** Parse the template up front so a broken one fails at configuration time. */
export function checkTemplate(template: ResolvedTemplate): void {
  try {
    Mustache.parse(template.source);
  } catch (err) {
    throw new DocTagsError({
      code: 'E201',
      message: `Invalid tags template ${template.path}: ${err instanceof Error ? err.message : String(err)}`,
      context: { path: template.path },
      cause: err,
    });
  }
}

export function buildView(index: TagIndex, options: RenderOptions = {}): TagsPageView {
  const targetFolder = options.targetFolder ?? '.';
  return {
    tags: sortTagEntries(index).map((entry) => ({
      name: entry.name,
      count: entry.pages.length,
      pages: entry.pages.map((page) => toPageView(page, targetFolder)),
    })),
  };
}

export function renderTagsPage(
  index: TagIndex,
  template: ResolvedTemplate,
  options: RenderOptions = {},
): string {
  const view = buildView(index, options);
  try {
    return Mustache.render(template.source, view);
  } catch (err) {
    throw new DocTagsError({
      code: 'E201',
      message: `Failed to render tags template ${template.path}: ${err instanceof Error ? err.message : String(err)}`,
      context: { path: template.path },
      cause: err,
    });
  }
}

function toPageView(page: PageMetadata, targetFolder: string): PageView {
  const target = toPosix(targetFolder);
  return {
    ...page.extra,
    filename: page.filename,
    title: page.title,
    tags: page.tags ? [...page.tags] : [],
    year: page.year ?? null,
    url: path.posix.relative(path.posix.join('/', target), path.posix.join('/', toPosix(page.filename))),
  };
}

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}
