/**
 * The three build lifecycle stages.
 *
 * Each stage takes the context produced by the previous one and returns a
 * new context; nothing is kept in module state. `TagsPipeline` threads the
 * context between the host's events.
 */

import fs from 'fs';
import path from 'path';
import { resolvePluginOptions, type ConfigWarning } from '../config';
import logger, { createLogger, type Logger } from '../shared/logger';
import {
  DocTagsError,
  type DocTagsConfig,
  type HostConfig,
  type HostFile,
  type HostPage,
  type PageMetadata,
  type TagIndex,
  type TagIndexStats,
} from '../shared/types';
import { extractMetadata } from '../tags/frontmatter';
import { buildTagIndex, sortByYear } from '../tags/index-builder';
import { checkTemplate, renderTagsPage, resolveTemplate, type ResolvedTemplate } from '../tags/renderer';

export const MARKDOWN_EXTENSION = '.md';

export type PipelinePhase = 'configured' | 'discovered';

export interface PipelineContext {
  readonly phase: PipelinePhase;
  readonly config: Readonly<DocTagsConfig>;
  readonly warnings: readonly ConfigWarning[];
  readonly logger: Logger;
  /** Absolute folder the generated page is written to. */
  readonly tagsFolder: string;
  readonly template: ResolvedTemplate;
  /** One entry per markdown file, in discovery order; null = no front matter. */
  readonly metadata: ReadonlyArray<PageMetadata | null>;
  /** Raw discovery order; exposed to every page as `all_tags`. */
  readonly allTags: TagIndex;
  readonly stats: TagIndexStats | null;
  readonly generatedPath: string | null;
  readonly artifact: HostFile | null;
}

export interface StageDeps {
  logger?: Logger;
  /** Relative `tags_folder` and `tags_template` resolve against this. Defaults to cwd. */
  baseDir?: string;
}

export interface DiscoverResult {
  context: PipelineContext;
  files: HostFile[];
}

/**
 * Configuration event: validate options, make sure the output folder
 * exists and load the template.
 */
export function configureStage(rawOptions: unknown, deps: StageDeps = {}): PipelineContext {
  const baseDir = deps.baseDir ?? process.cwd();
  const { config, warnings } = resolvePluginOptions(rawOptions);

  const log = createLogger({ component: 'tags' }, deps.logger ?? logger);
  if (config.verbose) log.level = 'debug';

  for (const warning of warnings) {
    log.warn({ field: warning.field }, warning.message);
  }

  const tagsFolder = path.resolve(baseDir, config.tags_folder);
  if (!fs.existsSync(tagsFolder)) {
    try {
      fs.mkdirSync(tagsFolder, { recursive: true });
    } catch (err) {
      throw new DocTagsError({
        code: 'E202',
        message: `Cannot create tags folder ${tagsFolder}: ${err instanceof Error ? err.message : String(err)}`,
        context: { path: tagsFolder },
        cause: err,
      });
    }
    log.debug({ path: tagsFolder }, 'created tags folder');
  }

  const template = resolveTemplate(
    config.tags_template !== undefined ? path.resolve(baseDir, config.tags_template) : undefined,
  );
  checkTemplate(template);

  return {
    phase: 'configured',
    config,
    warnings,
    logger: log,
    tagsFolder,
    template,
    metadata: [],
    allTags: new Map(),
    stats: null,
    generatedPath: null,
    artifact: null,
  };
}

/**
 * File-list event: scan every markdown file, build both tag indices,
 * write the generated page and register it with the host.
 */
export function discoverStage(
  ctx: PipelineContext,
  files: readonly HostFile[],
  host: HostConfig,
): DiscoverResult {
  const { config, logger: log } = ctx;

  const metadata: Array<PageMetadata | null> = [];
  for (const file of files) {
    if (!file.srcPath.endsWith(MARKDOWN_EXTENSION)) continue;
    log.debug({ file: file.srcPath }, `reading tags from ${file.srcPath}`);
    metadata.push(extractMetadata(file.srcPath, host.docsDir));
  }

  const { index: allTags, stats } = buildTagIndex(metadata);
  log.info(
    { ...stats },
    `Tags: Total pages scanned: ${stats.pagesScanned}, pages with tags: ${stats.pagesWithTags}, total tags: ${stats.totalTags}`,
  );
  if (stats.totalTags > 0) {
    log.debug({ tags: summarizeTags(allTags) }, 'Tags: index built');
  }

  let context: PipelineContext = { ...ctx, phase: 'discovered', metadata, allTags, stats };
  const outFiles = [...files];

  if (!config.tags_create_target) {
    return { context, files: outFiles };
  }

  const generatedPath = writeTagsPage(context);
  context = { ...context, generatedPath };

  if (config.tags_add_target) {
    const artifact: HostFile = {
      srcPath: config.tags_filename,
      srcDir: ctx.tagsFolder,
      destDir: path.join(host.siteDir, config.tags_target_folder),
      useDirectoryUrls: false,
    };
    outFiles.push(artifact);
    context = { ...context, artifact };
    log.debug({ ...artifact }, 'added tags page to the build');
  }

  return { context, files: outFiles };
}

/** Page-markdown event: expose the whole tag index to the page's template. */
export function transformStage(ctx: PipelineContext, markdown: string, page: HostPage): string {
  page.meta.all_tags = ctx.allTags;
  return markdown;
}

function writeTagsPage(ctx: PipelineContext): string {
  const { config } = ctx;
  const { index } = buildTagIndex(sortByYear(ctx.metadata));
  const text = renderTagsPage(index, ctx.template, { targetFolder: config.tags_target_folder });

  const outputPath = path.join(ctx.tagsFolder, config.tags_filename);
  try {
    fs.writeFileSync(outputPath, text, 'utf-8');
  } catch (err) {
    throw new DocTagsError({
      code: 'E202',
      message: `Cannot write tags page ${outputPath}: ${err instanceof Error ? err.message : String(err)}`,
      context: { path: outputPath },
      cause: err,
    });
  }

  ctx.logger.info({ path: outputPath, bytes: Buffer.byteLength(text) }, 'wrote tags page');
  return outputPath;
}

function summarizeTags(index: TagIndex): Record<string, number> {
  return Object.fromEntries(Array.from(index, ([tag, pages]): [string, number] => [tag, pages.length]));
}
