import { CombinedProcessor } from '@refmt/core';
import { command, flag, positional, string } from 'cmd-ts';

import { formatCombinedSummary } from '../../utils/format-output.js';
import { globalArgs, runCommand } from '../shared.js';

export const allCommand = command({
  name: 'all',
  description: 'Lowercase file names, transform emojis and clean whitespace (default)',
  args: {
    path: positional({
      type: string,
      displayName: 'path',
      description: 'File or directory to process',
    }),
    recursive: flag({
      long: 'recursive',
      short: 'r',
      description: 'Process directories recursively',
    }),
    dryRun: flag({
      long: 'dry-run',
      short: 'd',
      description: 'Show what would change without touching files',
    }),
    ...globalArgs,
  },
  handler: async (args) => {
    await runCommand(args, async ({ logger, useColors }) => {
      const processor = new CombinedProcessor({
        recursive: args.recursive,
        dryRun: args.dryRun,
        logger,
      });

      const stats = await processor.process(args.path);
      logger.info(formatCombinedSummary(stats, args.dryRun, useColors));
      return stats;
    });
  },
});
