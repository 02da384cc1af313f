import type { PageMetadata, TagIndex, TagIndexStats } from '../shared/types';

/** Sort key for pages without a `year`: after every real year. */
export const YEAR_SENTINEL = 5000;

export interface TagIndexResult {
  index: TagIndex;
  stats: TagIndexStats;
}

/**
 * Group pages by tag, in the order given.
 *
 * A page lands in one bucket per occurrence of a tag in its list, always
 * as the same object. `null` entries are pages without front matter and
 * are not counted as scanned.
 */
export function buildTagIndex(pages: ReadonlyArray<PageMetadata | null>): TagIndexResult {
  const index = new Map<string, PageMetadata[]>();
  let pagesScanned = 0;
  let pagesWithTags = 0;

  for (const page of pages) {
    if (!page) continue;
    pagesScanned++;

    const tags = page.tags ?? [];
    if (tags.length === 0) continue;
    pagesWithTags++;

    for (const tag of tags) {
      const bucket = index.get(tag);
      if (bucket) {
        bucket.push(page);
      } else {
        index.set(tag, [page]);
      }
    }
  }

  return {
    index,
    stats: { pagesScanned, pagesWithTags, totalTags: index.size },
  };
}

/** Stable ascending sort by `year`; pages without one go last. */
export function sortByYear(pages: ReadonlyArray<PageMetadata | null>): PageMetadata[] {
  const present = pages.filter((p): p is PageMetadata => p !== null);
  return present.sort((a, b) => (a.year ?? YEAR_SENTINEL) - (b.year ?? YEAR_SENTINEL));
}
