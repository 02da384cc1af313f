export { TagsPipeline } from './tags-pipeline';
export { configureStage, discoverStage, transformStage, MARKDOWN_EXTENSION } from './stages';
export type { PipelineContext, PipelinePhase, StageDeps, DiscoverResult } from './stages';
