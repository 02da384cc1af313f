import { z } from 'zod';

const nonEmptyPath = z.string().trim().min(1, 'must be a non-empty string');

/** Plugin options as written in doctags.yml or the host's plugin block. */
export const pluginOptionsSchema = z
  .object({
    verbose: z.boolean().optional(),
    tags_filename: nonEmptyPath.optional(),
    tags_folder: nonEmptyPath.optional(),
    tags_template: nonEmptyPath.optional(),
    tags_target_folder: nonEmptyPath.optional(),
    tags_add_target: z.boolean().optional(),
    tags_create_target: z.boolean().optional(),
  })
  .strict();

export type PluginOptionsInput = z.input<typeof pluginOptionsSchema>;
export type PluginOptions = z.output<typeof pluginOptionsSchema>;

export const KNOWN_KEYS: readonly string[] = pluginOptionsSchema.keyof().options;
