import {
  DocTagsError,
  type HostConfig,
  type HostFile,
  type HostPage,
  type PageMetadata,
  type TagIndex,
  type TagIndexStats,
} from '../shared/types';
import type { ConfigWarning } from '../config';
import {
  configureStage,
  discoverStage,
  transformStage,
  type PipelineContext,
  type StageDeps,
} from './stages';

/**
 * Host-facing controller. A host build calls `onConfig`, then `onFiles`,
 * then `onPageMarkdown` once per page; the controller owns the build's
 * context between those calls.
 */
export class TagsPipeline {
  private context: PipelineContext | null = null;

  constructor(
    private readonly options: unknown = {},
    private readonly deps: StageDeps = {},
  ) {}

  /** Starts a fresh build; any metadata from a previous build is dropped. */
  onConfig(): PipelineContext {
    this.context = configureStage(this.options, this.deps);
    return this.context;
  }

  /** Returns the host's file list, with the generated page appended when registered. */
  onFiles(files: readonly HostFile[], host: HostConfig): HostFile[] {
    const ctx = this.requirePhase('onFiles', 'configured');
    const result = discoverStage(ctx, files, host);
    this.context = result.context;
    return result.files;
  }

  onPageMarkdown(markdown: string, page: HostPage): string {
    const ctx = this.requirePhase('onPageMarkdown', 'discovered');
    return transformStage(ctx, markdown, page);
  }

  get metadata(): ReadonlyArray<PageMetadata | null> {
    return this.context?.metadata ?? [];
  }

  get allTags(): TagIndex {
    return this.context?.allTags ?? new Map();
  }

  get stats(): TagIndexStats | null {
    return this.context?.stats ?? null;
  }

  get generatedPath(): string | null {
    return this.context?.generatedPath ?? null;
  }

  get artifact(): HostFile | null {
    return this.context?.artifact ?? null;
  }

  get warnings(): readonly ConfigWarning[] {
    return this.context?.warnings ?? [];
  }

  private requirePhase(event: string, phase: PipelineContext['phase']): PipelineContext {
    const ctx = this.context;
    if (!ctx || ctx.phase !== phase) {
      throw new DocTagsError({
        code: 'E301',
        message: `${event} called out of order: expected the build to be ${phase}, but it is ${ctx?.phase ?? 'not configured'}`,
        context: { event },
      });
    }
    return ctx;
  }
}
