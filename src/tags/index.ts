/**
 * Barrel export for the tags module.
 */
export { scanFrontMatter, parseFrontMatter, deriveTitle, extractMetadata, toPageMetadata, UNTITLED } from './frontmatter';
export type { FrontMatterScan } from './frontmatter';

export { buildTagIndex, sortByYear, YEAR_SENTINEL } from './index-builder';
export type { TagIndexResult } from './index-builder';

export {
  sortTagEntries,
  resolveTemplate,
  checkTemplate,
  buildView,
  renderTagsPage,
  BUILTIN_TEMPLATE_PATH,
} from './renderer';
export type { TagEntry, ResolvedTemplate, PageView, TagsPageView, RenderOptions } from './renderer';
