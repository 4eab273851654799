import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { PlanGraphError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { OPTION_DEFAULTS } from './options.js';

export const CONFIG_FILE_NAME = 'plangraph.config.yaml';

export const configSchema = z
  .object({
    include_in_progress: z.boolean().optional(),
    include_status: z.boolean().optional(),
    include_descriptions: z.boolean().optional(),
  })
  .strict();

export interface ResolvedConfig {
  include_in_progress: boolean;
  include_status: boolean;
  include_descriptions: boolean;
}

/** Parse config YAML text and merge it over the defaults. Throws CONFIG_INVALID. */
export function parseConfig(content: string, source: string): ResolvedConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new PlanGraphError(
      ErrorCode.CONFIG_INVALID,
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      'Check the config file for syntax errors (indentation, colons, etc.)',
      err,
    );
  }

  // An empty file parses to null
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new PlanGraphError(
      ErrorCode.CONFIG_INVALID,
      `Invalid config in ${source}: ${detail}`,
      `Allowed keys: ${Object.keys(OPTION_DEFAULTS).join(', ')} (booleans)`,
      result.error,
    );
  }

  return { ...OPTION_DEFAULTS, ...result.data };
}

/**
 * Load CLI defaults. An explicit path must exist; the default file in `cwd`
 * is optional and its absence yields OPTION_DEFAULTS.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): ResolvedConfig {
  const target = configPath ? resolve(cwd, configPath) : resolve(cwd, CONFIG_FILE_NAME);

  if (!existsSync(target)) {
    if (configPath) {
      throw new PlanGraphError(
        ErrorCode.CONFIG_NOT_FOUND,
        `Config file not found: ${target}`,
        `Create it or drop --config to use ${CONFIG_FILE_NAME} from the working directory`,
      );
    }
    return { ...OPTION_DEFAULTS };
  }

  debug('config', `loading ${target}`);
  return parseConfig(readFileSync(target, 'utf-8'), target);
}
