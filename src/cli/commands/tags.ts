/**
 * `doctags tags` — list tags and how many pages carry each one.
 */

import { isDirectory, walkDocs } from '../../lib/docs-walker';
import { MARKDOWN_EXTENSION } from '../../pipeline';
import { DocTagsError } from '../../shared/types';
import { extractMetadata } from '../../tags/frontmatter';
import { buildTagIndex } from '../../tags/index-builder';
import { sortTagEntries } from '../../tags/renderer';
import { color, formatTagList, type TagCount } from '../output';

export interface TagsOptions {
  docsDir: string;
  json?: boolean;
}

export function runTags(options: TagsOptions, write: (msg: string) => void = console.log): number {
  if (!isDirectory(options.docsDir)) {
    write(`Docs directory not found: ${options.docsDir}`);
    return 2;
  }

  let tags: TagCount[];
  try {
    const metadata = walkDocs(options.docsDir)
      .filter((file) => file.endsWith(MARKDOWN_EXTENSION))
      .map((file) => extractMetadata(file, options.docsDir));
    const { index } = buildTagIndex(metadata);
    tags = sortTagEntries(index).map((entry) => ({ name: entry.name, count: entry.pages.length }));
  } catch (err) {
    if (err instanceof DocTagsError) {
      write(`${color.red('Error')} (${err.code}): ${err.message}`);
      return 1;
    }
    throw err;
  }

  write(options.json ? JSON.stringify(tags, null, 2) : formatTagList(tags));
  return 0;
}
