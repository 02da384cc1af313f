/**
 * Library entry point for hosts embedding the tags pipeline.
 */
export { TagsPipeline, configureStage, discoverStage, transformStage, MARKDOWN_EXTENSION } from './pipeline';
export type { PipelineContext, PipelinePhase, StageDeps, DiscoverResult } from './pipeline';

export * from './tags';

export {
  loadDocTagsConfig,
  readDocTagsOptions,
  resolvePluginOptions,
  CONFIG_DEFAULTS,
  pluginOptionsSchema,
} from './config';
export type { ConfigWarning, LoadConfigResult, PluginOptions } from './config';

export { DocTagsError } from './shared/types';
export type {
  PageMetadata,
  TagIndex,
  TagIndexStats,
  HostFile,
  HostConfig,
  HostPage,
  DocTagsConfig,
  DocTagsErrorCode,
} from './shared/types';

export { createLogger, createRootLogger } from './shared/logger';
