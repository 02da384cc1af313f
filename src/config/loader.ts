import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { pluginOptionsSchema, KNOWN_KEYS, type PluginOptions } from './schema';
import type { DocTagsConfig } from '../shared/types';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: DocTagsConfig;
  warnings: ConfigWarning[];
}

export const DEFAULT_CONFIG_FILE = 'doctags.yml';

/** Values used when a field is omitted or invalid. `tags_template` absent = built-in. */
export const CONFIG_DEFAULTS: Readonly<DocTagsConfig> = Object.freeze({
  verbose: false,
  tags_filename: 'tags.md',
  tags_folder: 'generated',
  tags_target_folder: '.',
  tags_add_target: true,
  tags_create_target: true,
});

/**
 * Validate raw plugin options and apply defaults.
 *
 * - Missing options → defaults
 * - Not a mapping → E401 warning + defaults
 * - Invalid values → E402 warning + field default
 * - Unknown keys → E402 warning with "did you mean?"
 * - add_target without create_target → E403 warning, nothing is added
 */
export function resolvePluginOptions(raw: unknown): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  if (raw === null || raw === undefined) {
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    warnings.push({
      field: '_options',
      message: 'E401: Options must be a mapping. Using defaults.',
    });
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  const result = pluginOptionsSchema.safeParse(raw);
  let options: PluginOptions = {};

  if (result.success) {
    options = result.data;
  } else {
    const invalidFields = new Set<string>();
    for (const issue of result.error.issues) {
      const fieldPath = issue.path.join('.');
      if (issue.code === 'unrecognized_keys') {
        for (const key of issue.keys) {
          const suggestion = findSimilarKey(key);
          const msg = suggestion
            ? `E402: Unknown key "${key}". Did you mean "${suggestion}"?`
            : `E402: Unknown key "${key}".`;
          warnings.push({ field: key, message: msg });
        }
      } else {
        invalidFields.add(String(issue.path[0]));
        warnings.push({
          field: fieldPath || '_unknown',
          message: `E402: ${fieldPath}: ${issue.message}. Using default for this field.`,
        });
      }
    }

    // Keep only the known, valid fields and re-parse
    const stripped: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (KNOWN_KEYS.includes(key) && !invalidFields.has(key)) {
        stripped[key] = value;
      }
    }
    const retryResult = pluginOptionsSchema.safeParse(stripped);
    if (retryResult.success) {
      options = retryResult.data;
    }
  }

  const config = mergeDefaults(options);

  if (config.tags_add_target && !config.tags_create_target) {
    warnings.push({
      field: 'tags_add_target',
      message:
        'E403: meaningless target config (requested to add a target, but not generate it). No target will be added.',
    });
  }

  return { config, warnings };
}

export interface ReadOptionsResult {
  /** Parsed YAML document, or undefined when there is nothing to use. */
  raw: unknown;
  warnings: ConfigWarning[];
}

/**
 * Read the raw options from a doctags.yml file without validating them.
 *
 * - Missing file → undefined
 * - Empty file → undefined
 * - Invalid YAML → E401 warning + undefined
 */
export function readDocTagsOptions(filePath: string = DEFAULT_CONFIG_FILE): ReadOptionsResult {
  let rawContent: string;

  try {
    rawContent = fs.readFileSync(filePath, 'utf-8');
  } catch {
    // No config file: zero-config run
    return { raw: undefined, warnings: [] };
  }

  if (rawContent.trim() === '') {
    return { raw: undefined, warnings: [] };
  }

  try {
    return { raw: parseYaml(rawContent), warnings: [] };
  } catch (err) {
    return {
      raw: undefined,
      warnings: [
        {
          field: '_yaml',
          message: `E401: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
        },
      ],
    };
  }
}

/** Read a doctags.yml file and resolve it against the defaults. */
export function loadDocTagsConfig(filePath: string = DEFAULT_CONFIG_FILE): LoadConfigResult {
  const { raw, warnings } = readDocTagsOptions(filePath);
  const resolved = resolvePluginOptions(raw);
  return { config: resolved.config, warnings: [...warnings, ...resolved.warnings] };
}

function mergeDefaults(options: PluginOptions): DocTagsConfig {
  const config: DocTagsConfig = { ...CONFIG_DEFAULTS };
  if (options.verbose !== undefined) config.verbose = options.verbose;
  if (options.tags_filename !== undefined) config.tags_filename = options.tags_filename;
  if (options.tags_folder !== undefined) config.tags_folder = options.tags_folder;
  if (options.tags_template !== undefined) config.tags_template = options.tags_template;
  if (options.tags_target_folder !== undefined) config.tags_target_folder = options.tags_target_folder;
  if (options.tags_add_target !== undefined) config.tags_add_target = options.tags_add_target;
  if (options.tags_create_target !== undefined) config.tags_create_target = options.tags_create_target;
  return config;
}

function findSimilarKey(key: string): string | null {
  const lower = key.toLowerCase();
  for (const known of KNOWN_KEYS) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
