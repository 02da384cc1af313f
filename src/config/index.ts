export {
  loadDocTagsConfig,
  readDocTagsOptions,
  resolvePluginOptions,
  CONFIG_DEFAULTS,
  DEFAULT_CONFIG_FILE,
} from './loader';
export type { ConfigWarning, LoadConfigResult, ReadOptionsResult } from './loader';
export { pluginOptionsSchema, KNOWN_KEYS } from './schema';
export type { PluginOptions, PluginOptionsInput } from './schema';
