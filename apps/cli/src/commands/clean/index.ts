import { WhitespaceCleaner } from '@refmt/core';
import { command, flag, positional, string } from 'cmd-ts';

import { formatCleanSummary } from '../../utils/format-output.js';
import { extensionsArg, globalArgs, resolveExtensions, runCommand } from '../shared.js';

export const cleanCommand = command({
  name: 'clean',
  description: 'Remove trailing whitespace from lines',
  args: {
    path: positional({
      type: string,
      displayName: 'path',
      description: 'File or directory to clean',
    }),
    noRecursive: flag({
      long: 'no-recursive',
      description: 'Only process the top level of a directory',
    }),
    dryRun: flag({
      long: 'dry-run',
      short: 'd',
      description: 'Show what would change without writing files',
    }),
    extensions: extensionsArg,
    ...globalArgs,
  },
  handler: async (args) => {
    await runCommand(args, async ({ logger, config, useColors }) => {
      const cleaner = new WhitespaceCleaner({
        extensions: resolveExtensions(args.extensions, config.clean?.extensions),
        recursive: args.noRecursive ? false : (config.clean?.recursive ?? true),
        dryRun: args.dryRun,
        logger,
      });

      const summary = await cleaner.process(args.path);
      logger.info(formatCleanSummary(summary, args.dryRun, useColors));
      return summary;
    });
  },
});
