import { BUILD_DIRECTORIES, FileWalker } from '../files/file-walker.js';
import { FileMutationReporter } from '../files/mutation-reporter.js';
import { type FileOutcome, type RunSummary, processSequentially, summarize } from '../files/run-summary.js';
import { readTextFile } from '../files/text-file.js';
import { type Logger, createLogger } from '../logging/logger.js';

export const DEFAULT_EMOJI_EXTENSIONS: readonly string[] = [
  '.md',
  '.txt',
  '.rst',
  '.org',
  '.py',
  '.rs',
  '.go',
  '.java',
  '.js',
  '.ts',
  '.jsx',
  '.tsx',
  '.c',
  '.h',
  '.cpp',
  '.hpp',
];

/** Status and task glyphs that carry meaning in checklists; they become text. */
export const TASK_EMOJI_REPLACEMENTS: ReadonlyMap<string, string> = new Map([
  ['✅', '[x]'],
  ['☑', '[x]'],
  ['✔', '[x]'],
  ['✓', '[x]'],
  ['☐', '[ ]'],
  ['☒', '[X]'],
  ['❌', '[X]'],
  ['❎', '[X]'],
  ['⚠', '[!]'],
  ['⛔', '[!]'],
  ['⭐', '[+]'],
  ['\u{1F7E0}', '[orange]'],
  ['\u{1F7E1}', '[yellow]'],
  ['\u{1F7E8}', '[yellow]'],
  ['\u{1F7E2}', '[green]'],
  ['\u{1F534}', '[red]'],
  ['\u{1F4DD}', '[note]'],
  ['\u{1F4CB}', '[list]'],
  ['\u{1F4C4}', '[doc]'],
  ['\u{1F4C5}', '[cal]'],
  ['\u{1F4C6}', '[cal]'],
  ['\u{1F5D3}', '[cal]'],
  ['\u{1F4D1}', '[tab]'],
  ['\u{1F4CC}', '[pin]'],
  ['\u{1F4CD}', '[pin]'],
  ['\u{1F4CE}', '[clip]'],
]);

const TASK_EMOJI_PATTERN = new RegExp(`[${[...TASK_EMOJI_REPLACEMENTS.keys()].join('')}]`, 'gu');

const GENERAL_EMOJI_PATTERN = new RegExp(
  [
    '[\\u{1F600}-\\u{1F64F}]', // emoticons
    '[\\u{1F300}-\\u{1F5FF}]', // symbols & pictographs
    '[\\u{1F680}-\\u{1F6FF}]', // transport & map
    '[\\u{1F1E0}-\\u{1F1FF}]', // flags
    '[\\u{2600}-\\u{26FF}]', // miscellaneous symbols
    '[\\u{2700}-\\u{27BF}]', // dingbats
    '[\\u{1F900}-\\u{1F9FF}]', // supplemental symbols
    '[\\u{1FA00}-\\u{1FA6F}]',
    '[\\u{1FA70}-\\u{1FAFF}]',
    '[\\u{FE00}-\\u{FE0F}]', // variation selectors
    '\\u{1F004}',
    '\\u{1F0CF}',
    '\\u{1F18E}',
    '[\\u{1F191}-\\u{1F19A}]',
    '[\\u{1F1E6}-\\u{1F1FF}]', // regional indicators
  ].join('|'),
  'gu',
);

export interface EmojiTransformOptions {
  readonly replaceTaskEmojis?: boolean;
  readonly removeOtherEmojis?: boolean;
}

export interface EmojiOptions extends EmojiTransformOptions {
  readonly extensions?: readonly string[];
  readonly recursive?: boolean;
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

export interface EmojiResult {
  readonly text: string;
  readonly changes: number;
}

/**
 * Replaces task emoji with bracketed text, then strips every remaining emoji.
 * Task replacement runs first so that e.g. `⚠` becomes `[!]` instead of vanishing.
 */
export function transformEmojis(text: string, options: EmojiTransformOptions = {}): EmojiResult {
  let result = text;
  let changes = 0;

  if (options.replaceTaskEmojis ?? true) {
    result = result.replace(TASK_EMOJI_PATTERN, (emoji) => {
      changes++;
      return TASK_EMOJI_REPLACEMENTS.get(emoji) ?? '';
    });
  }

  if (options.removeOtherEmojis ?? true) {
    // With task replacement off, task emoji are kept rather than stripped.
    const keepTaskEmojis = !(options.replaceTaskEmojis ?? true);
    result = result.replace(GENERAL_EMOJI_PATTERN, (emoji) => {
      if (keepTaskEmojis && TASK_EMOJI_REPLACEMENTS.has(emoji)) {
        return emoji;
      }
      changes++;
      return '';
    });
  }

  if (result === text) {
    return { text, changes: 0 };
  }
  return { text: result, changes: Math.max(changes, 1) };
}

export class EmojiTransformer {
  private readonly walker: FileWalker;
  private readonly reporter: FileMutationReporter;
  private readonly logger: Logger;
  private readonly transformOptions: EmojiTransformOptions;

  constructor(options: EmojiOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.transformOptions = {
      replaceTaskEmojis: options.replaceTaskEmojis ?? true,
      removeOtherEmojis: options.removeOtherEmojis ?? true,
    };
    this.walker = new FileWalker({
      extensions: options.extensions ?? DEFAULT_EMOJI_EXTENSIONS,
      recursive: options.recursive ?? true,
      skipHidden: true,
      ignoreDirectories: BUILD_DIRECTORIES,
      logger: this.logger,
    });
    this.reporter = new FileMutationReporter({
      dryRun: options.dryRun ?? false,
      logger: this.logger,
      messages: {
        changed: (filePath) => `Transformed emojis in '${filePath}'`,
        wouldChange: (filePath) => `Would transform emojis in '${filePath}'`,
      },
    });
  }

  /**
   * Processes one file if the walker's filters accept it. `acceptAs` is the path
   * judged by the filters, for a file about to be renamed in a dry run.
   */
  async transformFile(filePath: string, root: string, acceptAs = filePath): Promise<FileOutcome | undefined> {
    if (!this.walker.accepts(acceptAs, root)) {
      return undefined;
    }
    return this.transform(filePath);
  }

  async process(root: string): Promise<RunSummary> {
    const files = await this.walker.walk(root);
    this.logger.debug(`${files.length} candidate file(s) for emoji transformation`);
    const outcomes = await processSequentially(files, (filePath) => this.transform(filePath), this.logger);
    return summarize(outcomes);
  }

  private async transform(filePath: string): Promise<FileOutcome> {
    const content = await readTextFile(filePath);
    const result = transformEmojis(content, this.transformOptions);
    return this.reporter.commit(filePath, content, result.text, result.changes);
  }
}
