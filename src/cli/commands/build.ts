/**
 * `doctags build` — run the tags pipeline over a docs directory.
 *
 * Stands in for a site build: lists the files, fires the three lifecycle
 * events in order and reports what was produced.
 */

import fs from 'fs';
import path from 'path';
import { readDocTagsOptions } from '../../config';
import { isDirectory, walkDocs } from '../../lib/docs-walker';
import { TagsPipeline, MARKDOWN_EXTENSION } from '../../pipeline';
import type { Logger } from '../../shared/logger';
import { DocTagsError, type HostConfig, type HostFile } from '../../shared/types';
import { color, formatBuildResults, type BuildSummary } from '../output';

export interface BuildOptions {
  docsDir: string;
  siteDir: string;
  configPath?: string;
  /** Relative tags_folder/tags_template resolve against this. Defaults to cwd. */
  baseDir?: string;
  verbose?: boolean;
  json?: boolean;
  logger?: Logger;
}

export function runBuild(options: BuildOptions, write: (msg: string) => void = console.log): number {
  if (!isDirectory(options.docsDir)) {
    write(`Docs directory not found: ${options.docsDir}`);
    return 2;
  }

  const { raw, warnings: fileWarnings } = readDocTagsOptions(options.configPath);
  const pipelineOptions = options.verbose ? withVerbose(raw) : raw;

  const host: HostConfig = { docsDir: options.docsDir, siteDir: options.siteDir };
  const pipeline = new TagsPipeline(pipelineOptions, {
    logger: options.logger,
    baseDir: options.baseDir,
  });

  try {
    pipeline.onConfig();

    const files: HostFile[] = walkDocs(options.docsDir).map((srcPath) => ({
      srcPath,
      srcDir: options.docsDir,
      destDir: options.siteDir,
      useDirectoryUrls: true,
    }));
    pipeline.onFiles(files, host);

    for (const file of files) {
      if (!file.srcPath.endsWith(MARKDOWN_EXTENSION)) continue;
      const markdown = fs.readFileSync(path.join(options.docsDir, file.srcPath), 'utf-8');
      pipeline.onPageMarkdown(markdown, { file, meta: {} });
    }
  } catch (err) {
    if (err instanceof DocTagsError) {
      write(`${color.red('Error')} (${err.code}): ${err.message}`);
      return 1;
    }
    throw err;
  }

  const summary: BuildSummary = {
    stats: pipeline.stats ?? { pagesScanned: 0, pagesWithTags: 0, totalTags: 0 },
    generatedPath: pipeline.generatedPath,
    artifact: pipeline.artifact,
    warnings: [...fileWarnings, ...pipeline.warnings],
  };

  write(options.json ? JSON.stringify(summary, null, 2) : formatBuildResults(summary));
  return 0;
}

function withVerbose(raw: unknown): unknown {
  if (raw === null || raw === undefined) return { verbose: true };
  if (typeof raw === 'object' && !Array.isArray(raw)) return { ...raw, verbose: true };
  return raw;
}
