import { CaseConverter, type CaseStyle, ConfigurationError, caseStyleLabel, isCaseStyle } from '@refmt/core';
import { command, flag, option, optional, positional, string } from 'cmd-ts';

import { formatConvertSummary } from '../../utils/format-output.js';
import { extensionsArg, globalArgs, resolveExtensions, runCommand } from '../shared.js';

export type StyleFlags = Readonly<Record<CaseStyle, boolean>>;

/**
 * Picks the single style whose flag is set, or `fallback` (from the config
 * file) when no flag is set.
 *
 * @throws ConfigurationError when several are set, or none and there is no fallback
 */
export function resolveCaseStyle(
  flags: StyleFlags,
  role: 'source' | 'target',
  fallback?: CaseStyle,
): CaseStyle {
  const chosen = Object.entries(flags)
    .filter(([, enabled]) => enabled)
    .map(([style]) => style);
  if (chosen.length === 0 && fallback !== undefined) {
    return fallback;
  }
  const style = chosen[0];
  if (chosen.length !== 1 || style === undefined || !isCaseStyle(style)) {
    throw new ConfigurationError(`exactly one ${role} style must be chosen`);
  }
  return style;
}

function styleFlag(direction: 'from' | 'to', style: CaseStyle) {
  return flag({
    long: `${direction}-${style}`,
    description: `${direction === 'from' ? 'Convert from' : 'Convert to'} ${caseStyleLabel(style)}`,
  });
}

export const convertCommand = command({
  name: 'convert',
  description: 'Convert identifiers between case styles',
  args: {
    fromCamel: styleFlag('from', 'camel'),
    fromPascal: styleFlag('from', 'pascal'),
    fromSnake: styleFlag('from', 'snake'),
    fromScreamingSnake: styleFlag('from', 'screaming-snake'),
    fromKebab: styleFlag('from', 'kebab'),
    fromScreamingKebab: styleFlag('from', 'screaming-kebab'),
    toCamel: styleFlag('to', 'camel'),
    toPascal: styleFlag('to', 'pascal'),
    toSnake: styleFlag('to', 'snake'),
    toScreamingSnake: styleFlag('to', 'screaming-snake'),
    toKebab: styleFlag('to', 'kebab'),
    toScreamingKebab: styleFlag('to', 'screaming-kebab'),
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
      description: 'Show what would change without writing files',
    }),
    extensions: extensionsArg,
    prefix: option({
      type: optional(string),
      long: 'prefix',
      description: 'Prefix added to every converted identifier',
    }),
    suffix: option({
      type: optional(string),
      long: 'suffix',
      description: 'Suffix added to every converted identifier',
    }),
    stripPrefix: option({
      type: optional(string),
      long: 'strip-prefix',
      description: 'Remove this prefix before converting',
    }),
    stripSuffix: option({
      type: optional(string),
      long: 'strip-suffix',
      description: 'Remove this suffix before converting',
    }),
    replacePrefixFrom: option({
      type: optional(string),
      long: 'replace-prefix-from',
      description: 'Prefix to replace before converting (requires --replace-prefix-to)',
    }),
    replacePrefixTo: option({
      type: optional(string),
      long: 'replace-prefix-to',
      description: 'Replacement for --replace-prefix-from',
    }),
    replaceSuffixFrom: option({
      type: optional(string),
      long: 'replace-suffix-from',
      description: 'Suffix to replace before converting (requires --replace-suffix-to)',
    }),
    replaceSuffixTo: option({
      type: optional(string),
      long: 'replace-suffix-to',
      description: 'Replacement for --replace-suffix-from',
    }),
    glob: option({
      type: optional(string),
      long: 'glob',
      description: 'Only process files matching this glob (e.g. "*_test.py")',
    }),
    wordFilter: option({
      type: optional(string),
      long: 'word-filter',
      description: 'Only convert identifiers matching this regular expression',
    }),
    ...globalArgs,
  },
  handler: async (args) => {
    await runCommand(args, async ({ logger, config, useColors }) => {
      const from = resolveCaseStyle(
        {
          camel: args.fromCamel,
          pascal: args.fromPascal,
          snake: args.fromSnake,
          'screaming-snake': args.fromScreamingSnake,
          kebab: args.fromKebab,
          'screaming-kebab': args.fromScreamingKebab,
        },
        'source',
        config.convert?.from,
      );
      const to = resolveCaseStyle(
        {
          camel: args.toCamel,
          pascal: args.toPascal,
          snake: args.toSnake,
          'screaming-snake': args.toScreamingSnake,
          kebab: args.toKebab,
          'screaming-kebab': args.toScreamingKebab,
        },
        'target',
        config.convert?.to,
      );

      const converter = new CaseConverter({
        from,
        to,
        prefix: args.prefix,
        suffix: args.suffix,
        stripPrefix: args.stripPrefix,
        stripSuffix: args.stripSuffix,
        replacePrefixFrom: args.replacePrefixFrom,
        replacePrefixTo: args.replacePrefixTo,
        replaceSuffixFrom: args.replaceSuffixFrom,
        replaceSuffixTo: args.replaceSuffixTo,
        wordFilter: args.wordFilter,
        glob: args.glob ?? config.convert?.glob,
        extensions: resolveExtensions(args.extensions, config.convert?.extensions),
        recursive: args.recursive || (config.convert?.recursive ?? false),
        dryRun: args.dryRun,
        logger,
      });

      const summary = await converter.process(args.path);
      logger.info(formatConvertSummary(summary, args.dryRun, useColors));
      return summary;
    });
  },
});
