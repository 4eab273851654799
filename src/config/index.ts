export {
  OPTION_DEFAULTS,
  readyOptionsSchema,
  outlineOptionsSchema,
  flowchartOptionsSchema,
  dotOptionsSchema,
  parseOptions,
} from './options.js';
export type { ReadyOptions, OutlineOptions, FlowchartOptions, DotOptions } from './options.js';
export { loadConfig, parseConfig, configSchema, CONFIG_FILE_NAME } from './loader.js';
export type { ResolvedConfig } from './loader.js';
