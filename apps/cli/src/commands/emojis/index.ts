import { EmojiTransformer } from '@refmt/core';
import { command, flag, positional, string } from 'cmd-ts';

import { formatEmojiSummary } from '../../utils/format-output.js';
import { extensionsArg, globalArgs, resolveExtensions, runCommand } from '../shared.js';

export const emojisCommand = command({
  name: 'emojis',
  description: 'Replace task emojis with text and remove other emojis',
  args: {
    path: positional({
      type: string,
      displayName: 'path',
      description: 'File or directory to process',
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
    keepTaskEmojis: flag({
      long: 'keep-task-emojis',
      description: 'Leave task emojis such as ✅ and ☐ untouched',
    }),
    keepOtherEmojis: flag({
      long: 'keep-other-emojis',
      description: 'Only replace task emojis; keep all others',
    }),
    ...globalArgs,
  },
  handler: async (args) => {
    await runCommand(args, async ({ logger, config, useColors }) => {
      const transformer = new EmojiTransformer({
        extensions: resolveExtensions(args.extensions, config.emojis?.extensions),
        recursive: args.noRecursive ? false : (config.emojis?.recursive ?? true),
        dryRun: args.dryRun,
        replaceTaskEmojis: args.keepTaskEmojis ? false : (config.emojis?.replaceTaskEmojis ?? true),
        removeOtherEmojis: args.keepOtherEmojis ? false : (config.emojis?.removeOtherEmojis ?? true),
        logger,
      });

      const summary = await transformer.process(args.path);
      logger.info(formatEmojiSummary(summary, args.dryRun, useColors));
      return summary;
    });
  },
});
