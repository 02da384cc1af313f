// === Page Metadata ===

/**
 * Metadata extracted from one page's front matter.
 *
 * The known fields are lifted out of the raw mapping; every other key is
 * kept untouched in `extra` and handed to the template as-is.
 */
export interface PageMetadata {
  /** Source path relative to the docs directory, POSIX separators. */
  filename: string;
  title: string;
  tags?: string[];
  /** Only used as a sort key for the generated page. */
  year?: number;
  extra: Readonly<Record<string, unknown>>;
}

/** Tag name to the pages carrying it, in insertion order. */
export type TagIndex = ReadonlyMap<string, readonly PageMetadata[]>;

export interface TagIndexStats {
  pagesScanned: number;
  pagesWithTags: number;
  totalTags: number;
}

// === Host Build Collaborators ===

/** A file known to the host build. */
export interface HostFile {
  /** Path relative to `srcDir`. */
  srcPath: string;
  srcDir: string;
  destDir: string;
  useDirectoryUrls: boolean;
}

export interface HostConfig {
  docsDir: string;
  siteDir: string;
}

/** A page as the host hands it to the markdown stage. */
export interface HostPage {
  file: HostFile;
  meta: Record<string, unknown>;
}

// === Plugin Options (doctags.yml / host plugin config) ===

export interface DocTagsConfig {
  verbose: boolean;
  tags_filename: string;
  tags_folder: string;
  /** Absent means the built-in template. */
  tags_template?: string;
  tags_target_folder: string;
  tags_add_target: boolean;
  tags_create_target: boolean;
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export type DocTagsErrorCode =
  | 'E101' // malformed front matter
  | 'E102' // source file cannot be read
  | 'E201' // template cannot be resolved or parsed
  | 'E202' // output folder or file cannot be written
  | 'E301'; // lifecycle event called out of order

export interface ErrorContext {
  file?: string;
  path?: string;
  event?: string;
}

export class DocTagsError extends Error {
  readonly code: DocTagsErrorCode;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly timestamp: string;

  constructor(opts: {
    code: DocTagsErrorCode;
    severity?: ErrorSeverity;
    message: string;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super(opts.message);
    this.name = 'DocTagsError';
    this.code = opts.code;
    this.severity = opts.severity ?? 'critical';
    this.context = opts.context ?? {};
    this.cause = opts.cause instanceof Error ? opts.cause : undefined;
    this.timestamp = new Date().toISOString();
  }
}
