import { z } from 'zod';

import { ConfigurationError, errorMessage } from '../errors.js';
import { CASE_STYLES, type CaseStyle, compileCasePattern, joinWords, splitWords } from './case-style.js';

const RewriteJobOptionsSchema = z
  .object({
    from: z.enum(CASE_STYLES),
    to: z.enum(CASE_STYLES),
    prefix: z.string().default(''),
    suffix: z.string().default(''),
    stripPrefix: z.string().optional(),
    stripSuffix: z.string().optional(),
    replacePrefixFrom: z.string().optional(),
    replacePrefixTo: z.string().optional(),
    replaceSuffixFrom: z.string().optional(),
    replaceSuffixTo: z.string().optional(),
    wordFilter: z.string().optional(),
  })
  .superRefine((options, ctx) => {
    if (options.replacePrefixTo !== undefined && options.replacePrefixFrom === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['replacePrefixTo'],
        message: 'replace-prefix-to requires replace-prefix-from',
      });
    }
    if (options.replaceSuffixTo !== undefined && options.replaceSuffixFrom === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['replaceSuffixTo'],
        message: 'replace-suffix-to requires replace-suffix-from',
      });
    }
  });

export type RewriteJobOptions = z.input<typeof RewriteJobOptionsSchema>;

export type RewriteStageName = 'strip-prefix' | 'strip-suffix' | 'replace-prefix' | 'replace-suffix';

/**
 * One pre-conversion string transform. Stages run in a fixed order and only
 * exist when their option was supplied.
 */
export interface RewriteStage {
  readonly name: RewriteStageName;
  apply(name: string): string;
}

export interface RewriteJob {
  readonly from: CaseStyle;
  readonly to: CaseStyle;
  readonly prefix: string;
  readonly suffix: string;
  readonly stages: readonly RewriteStage[];
  readonly wordFilter?: RegExp;
  /** Global matcher for the source style; shared by every file of a run. */
  readonly matcher: RegExp;
}

export interface MatchOutcome {
  readonly text: string;
  readonly changed: boolean;
  /** Tokens recognized in the source style. */
  readonly matches: number;
  /** Tokens whose replacement differs from the original token. */
  readonly replacements: number;
}

/**
 * Validates the options and compiles everything a run needs.
 *
 * @throws ConfigurationError for an unpaired replace-*-to, a malformed word filter
 *   or an unknown case style.
 */
export function createRewriteJob(options: RewriteJobOptions): RewriteJob {
  const parsed = RewriteJobOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid conversion options: ${details}`);
  }

  const config = parsed.data;
  return Object.freeze({
    from: config.from,
    to: config.to,
    prefix: config.prefix,
    suffix: config.suffix,
    stages: Object.freeze(buildStages(config)),
    wordFilter: config.wordFilter === undefined ? undefined : compileWordFilter(config.wordFilter),
    matcher: compileCasePattern(config.from),
  });
}

/**
 * Rewrites a single matched token.
 *
 * When the word filter rejects the processed name, the raw token comes back
 * untouched: the strip/replace stages are discarded along with the conversion.
 */
export function rewriteIdentifier(job: RewriteJob, token: string): string {
  const processed = job.stages.reduce((name, stage) => stage.apply(name), token);

  if (job.wordFilter && !job.wordFilter.test(processed)) {
    return token;
  }

  const words = splitWords(job.from, processed);
  return joinWords(job.to, words, job.prefix, job.suffix);
}

/**
 * Single left-to-right substitution pass; replacement text is never rescanned.
 */
export function rewriteText(job: RewriteJob, text: string): MatchOutcome {
  let matches = 0;
  let replacements = 0;

  const rewritten = text.replace(job.matcher, (token) => {
    matches++;
    const replacement = rewriteIdentifier(job, token);
    if (replacement !== token) {
      replacements++;
    }
    return replacement;
  });

  return { text: rewritten, changed: rewritten !== text, matches, replacements };
}

function buildStages(config: z.output<typeof RewriteJobOptionsSchema>): RewriteStage[] {
  const candidates: Array<RewriteStage | undefined> = [
    config.stripPrefix === undefined ? undefined : stripPrefixStage(config.stripPrefix),
    config.stripSuffix === undefined ? undefined : stripSuffixStage(config.stripSuffix),
    config.replacePrefixFrom === undefined || config.replacePrefixTo === undefined
      ? undefined
      : replacePrefixStage(config.replacePrefixFrom, config.replacePrefixTo),
    config.replaceSuffixFrom === undefined || config.replaceSuffixTo === undefined
      ? undefined
      : replaceSuffixStage(config.replaceSuffixFrom, config.replaceSuffixTo),
  ];
  return candidates.filter((stage): stage is RewriteStage => stage !== undefined);
}

function stripPrefixStage(prefix: string): RewriteStage {
  return {
    name: 'strip-prefix',
    apply: (name) => (name.startsWith(prefix) ? name.slice(prefix.length) : name),
  };
}

function stripSuffixStage(suffix: string): RewriteStage {
  return {
    name: 'strip-suffix',
    apply: (name) => (name.endsWith(suffix) ? name.slice(0, name.length - suffix.length) : name),
  };
}

function replacePrefixStage(from: string, to: string): RewriteStage {
  return {
    name: 'replace-prefix',
    apply: (name) => (name.startsWith(from) ? to + name.slice(from.length) : name),
  };
}

function replaceSuffixStage(from: string, to: string): RewriteStage {
  return {
    name: 'replace-suffix',
    apply: (name) => (name.endsWith(from) ? name.slice(0, name.length - from.length) + to : name),
  };
}

function compileWordFilter(pattern: string): RegExp {
  try {
    // No `g` flag: `test` must not carry lastIndex between tokens.
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid word filter '${pattern}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
