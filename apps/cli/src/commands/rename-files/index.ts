import {
  type CaseTransform,
  ConfigurationError,
  FileRenamer,
  type SeparatorReplace,
  type TimestampFormat,
} from '@refmt/core';
import { command, flag, option, optional, positional, string } from 'cmd-ts';

import { formatRenameSummary } from '../../utils/format-output.js';
import { globalArgs, runCommand } from '../shared.js';

export function pickOne<T extends string>(
  choices: ReadonlyArray<readonly [T, boolean]>,
  fallback: T,
  flags: string,
): T {
  const chosen = choices.filter(([, enabled]) => enabled);
  if (chosen.length > 1) {
    throw new ConfigurationError(`only one of ${flags} may be given`);
  }
  return chosen[0]?.[0] ?? fallback;
}

export const renameFilesCommand = command({
  name: 'rename_files',
  description: 'Rename files: change case, replace separators, add or remove affixes',
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
      description: 'Show what would be renamed without renaming',
    }),
    toLowercase: flag({ long: 'to-lowercase', description: 'Lowercase file names' }),
    toUppercase: flag({ long: 'to-uppercase', description: 'Uppercase file names' }),
    toCapitalize: flag({
      long: 'to-capitalize',
      description: 'Uppercase the first letter, lowercase the rest',
    }),
    underscored: flag({
      long: 'underscored',
      description: 'Replace spaces and hyphens with underscores',
    }),
    hyphenated: flag({
      long: 'hyphenated',
      description: 'Replace spaces and underscores with hyphens',
    }),
    addPrefix: option({ type: optional(string), long: 'add-prefix', description: 'Prefix to add' }),
    rmPrefix: option({ type: optional(string), long: 'rm-prefix', description: 'Prefix to remove' }),
    addSuffix: option({
      type: optional(string),
      long: 'add-suffix',
      description: 'Suffix to add before the extension',
    }),
    rmSuffix: option({
      type: optional(string),
      long: 'rm-suffix',
      description: 'Suffix to remove before the extension',
    }),
    timestampLong: flag({
      long: 'timestamp-long',
      description: 'Prefix names with the current date as YYYYMMDD_',
    }),
    timestampShort: flag({
      long: 'timestamp-short',
      description: 'Prefix names with the current date as YYMMDD_',
    }),
    ...globalArgs,
  },
  handler: async (args) => {
    await runCommand(args, async ({ logger, config, useColors }) => {
      const caseTransform = pickOne<CaseTransform>(
        [
          ['lowercase', args.toLowercase],
          ['uppercase', args.toUppercase],
          ['capitalize', args.toCapitalize],
        ],
        'none',
        '--to-lowercase, --to-uppercase, --to-capitalize',
      );
      const separator = pickOne<SeparatorReplace>(
        [
          ['underscore', args.underscored],
          ['hyphen', args.hyphenated],
        ],
        'none',
        '--underscored, --hyphenated',
      );
      const timestamp = pickOne<TimestampFormat>(
        [
          ['long', args.timestampLong],
          ['short', args.timestampShort],
        ],
        'none',
        '--timestamp-long, --timestamp-short',
      );

      const renamer = new FileRenamer({
        caseTransform,
        separator,
        timestamp,
        addPrefix: args.addPrefix,
        removePrefix: args.rmPrefix,
        addSuffix: args.addSuffix,
        removeSuffix: args.rmSuffix,
        recursive: args.noRecursive ? false : (config.renameFiles?.recursive ?? true),
        dryRun: args.dryRun,
        logger,
      });

      const summary = await renamer.process(args.path);
      logger.info(formatRenameSummary(summary, args.dryRun, useColors));
      return summary;
    });
  },
});
