import {
  type Logger,
  type RefmtConfig,
  createLogger,
  errorMessage,
  loadConfig,
  normalizeExtensions,
  resolveLogLevel,
} from '@refmt/core';
import { array, flag, multioption, option, optional, string } from 'cmd-ts';

import { isTTY } from '../utils/format-output.js';

/** Options accepted by every subcommand. */
export const globalArgs = {
  verbose: flag({
    long: 'verbose',
    short: 'v',
    description: 'Enable debug output',
  }),
  quiet: flag({
    long: 'quiet',
    short: 'q',
    description: 'Only print errors',
  }),
  logFile: option({
    type: optional(string),
    long: 'log-file',
    description: 'Also write debug-level log lines to this file',
  }),
  config: option({
    type: optional(string),
    long: 'config',
    description: 'Path to a refmt config file (defaults to refmt.config.yaml discovery)',
  }),
};

export const extensionsArg = multioption({
  type: array(string),
  long: 'extensions',
  short: 'e',
  description: 'File extensions to process (repeatable, comma-separated)',
});

export interface GlobalFlags {
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly logFile?: string;
  readonly config?: string;
}

export interface CommandContext {
  readonly logger: Logger;
  readonly config: RefmtConfig;
  readonly useColors: boolean;
}

export interface CommandResult {
  readonly failed: number;
}

/**
 * Extension list from the command line, falling back to the config file.
 * `undefined` leaves the transformer's own default in place.
 */
export function resolveExtensions(
  cliValues: readonly string[],
  configValues: readonly string[] | undefined,
): string[] | undefined {
  if (cliValues.length > 0) {
    return normalizeExtensions(cliValues);
  }
  return configValues ? normalizeExtensions(configValues) : undefined;
}

/**
 * Loads config, builds the logger and runs `body`. Errors are printed as
 * `Error: ...`; any error or failed file sets a non-zero exit code.
 */
export async function runCommand(
  flags: GlobalFlags,
  body: (context: CommandContext) => Promise<CommandResult>,
): Promise<void> {
  try {
    const { config } = await loadConfig(process.cwd(), flags.config);
    const useColors = isTTY();
    const logger = createLogger({
      level: resolveLogLevel(flags),
      logFile: flags.logFile ?? config.logFile,
      useColors,
    });
    const result = await body({ logger, config, useColors });
    if (result.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
