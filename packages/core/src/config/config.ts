/**
 * Project-level configuration for refmt.
 *
 * An optional YAML file supplies per-command defaults. Values given on the
 * command line always win over the file.
 *
 * @example
 * ```yaml
 * # refmt.config.yaml
 * convert:
 *   from: camelCase
 *   to: snake_case
 *   extensions: [.ts, .tsx]
 *   recursive: true
 * clean:
 *   recursive: false
 * emojis:
 *   replaceTaskEmojis: true
 *   removeOtherEmojis: false
 * logFile: refmt.log
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

import { parseCaseStyle } from '../case/case-style.js';
import { ConfigurationError, errorMessage } from '../errors.js';

const extensionList = z.array(z.string().min(1));

// Canonical tags and common spellings such as `snake_case`.
const caseStyleName = z.string().transform((value, ctx) => {
  try {
    return parseCaseStyle(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
    return z.NEVER;
  }
});

const RefmtConfigSchema = z.object({
  convert: z
    .object({
      /** Used when no `--from-*` flag is given. */
      from: caseStyleName.optional(),
      /** Used when no `--to-*` flag is given. */
      to: caseStyleName.optional(),
      extensions: extensionList.optional(),
      recursive: z.boolean().optional(),
      glob: z.string().min(1).optional(),
    })
    .optional(),

  clean: z
    .object({
      extensions: extensionList.optional(),
      recursive: z.boolean().optional(),
    })
    .optional(),

  emojis: z
    .object({
      extensions: extensionList.optional(),
      recursive: z.boolean().optional(),
      replaceTaskEmojis: z.boolean().optional(),
      removeOtherEmojis: z.boolean().optional(),
    })
    .optional(),

  renameFiles: z
    .object({
      recursive: z.boolean().optional(),
    })
    .optional(),

  /** Mirror of `--log-file`, resolved relative to the config file. */
  logFile: z.string().min(1).optional(),
});

export type RefmtConfig = z.infer<typeof RefmtConfigSchema>;

export interface LoadedConfig {
  readonly config: RefmtConfig;
  /** Absolute path of the file the config came from, if any. */
  readonly source?: string;
}

/**
 * Config file discovery order.
 * The first file found wins.
 */
export const CONFIG_FILE_NAMES = [
  'refmt.config.yaml',
  'refmt.config.yml',
  '.refmt.yaml',
  '.refmt/config.yaml',
] as const;

/**
 * Validates an already-parsed config object.
 *
 * @throws ConfigurationError naming the offending key
 */
export function parseConfig(raw: unknown, source = 'config'): RefmtConfig {
  // An empty YAML document parses to null.
  const result = RefmtConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config in ${source}: ${details}`);
  }
  return result.data;
}

/**
 * Loads the config named by `explicitPath`, or the first discovered file under
 * `projectRoot`. Returns an empty config when nothing is found.
 */
export async function loadConfig(projectRoot: string, explicitPath?: string): Promise<LoadedConfig> {
  const filePath = explicitPath ? path.resolve(explicitPath) : discoverConfigFile(projectRoot);
  if (!filePath) {
    return { config: {} };
  }

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const config = parseConfig(raw, filePath);
  if (config.logFile !== undefined) {
    return {
      config: { ...config, logFile: path.resolve(path.dirname(filePath), config.logFile) },
      source: filePath,
    };
  }
  return { config, source: filePath };
}

function discoverConfigFile(projectRoot: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.resolve(projectRoot, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }
  return undefined;
}
