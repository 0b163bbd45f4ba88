import { stat } from 'node:fs/promises';
import path from 'node:path';

import { BUILD_DIRECTORIES, FileWalker, deepestFirst } from '../files/file-walker.js';
import { type FileOutcome, processSequentially, summarize } from '../files/run-summary.js';
import { type Logger, createLogger } from '../logging/logger.js';
import { EmojiTransformer } from './emoji.js';
import { FileRenamer } from './rename.js';
import { WhitespaceCleaner } from './whitespace.js';

export interface CombinedOptions {
  readonly recursive?: boolean;
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

export interface CombinedStats {
  readonly filesRenamed: number;
  readonly filesEmojiTransformed: number;
  readonly emojiChanges: number;
  readonly filesWhitespaceCleaned: number;
  readonly whitespaceLinesCleaned: number;
  readonly failed: number;
  readonly outcomes: readonly FileOutcome[];
}

/**
 * The default `refmt <path>` pass: lowercase file names, then emoji, then
 * trailing whitespace, one file at a time.
 */
export class CombinedProcessor {
  private readonly walker: FileWalker;
  private readonly renamer: FileRenamer;
  private readonly emoji: EmojiTransformer;
  private readonly whitespace: WhitespaceCleaner;
  private readonly logger: Logger;

  constructor(options: CombinedOptions = {}) {
    const recursive = options.recursive ?? true;
    const dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger();
    this.walker = new FileWalker({
      recursive,
      skipHidden: true,
      ignoreDirectories: BUILD_DIRECTORIES,
      logger: this.logger,
    });
    this.renamer = new FileRenamer({
      caseTransform: 'lowercase',
      lowercaseExtension: true,
      recursive,
      dryRun,
      logger: this.logger,
    });
    this.emoji = new EmojiTransformer({ recursive, dryRun, logger: this.logger });
    this.whitespace = new WhitespaceCleaner({ recursive, dryRun, logger: this.logger });
  }

  async process(root: string): Promise<CombinedStats> {
    const files = deepestFirst(await this.walker.walk(root));
    const base = (await stat(root)).isDirectory() ? root : path.dirname(root);
    this.logger.debug(`${files.length} candidate file(s) for combined processing`);

    let filesRenamed = 0;
    let filesEmojiTransformed = 0;
    let emojiChanges = 0;
    let filesWhitespaceCleaned = 0;
    let whitespaceLinesCleaned = 0;

    const outcomes = await processSequentially(
      files,
      async (filePath) => {
        const renamed = await this.renamer.renameFile(filePath);
        const current = renamed.currentPath;
        if (renamed.status === 'changed') {
          filesRenamed++;
        }

        const emoji = await this.emoji.transformFile(current, base, renamed.targetPath);
        if (emoji?.status === 'changed') {
          filesEmojiTransformed++;
          emojiChanges += emoji.changes;
        }

        const cleaned = await this.whitespace.cleanFile(current, base, renamed.targetPath);
        if (cleaned?.status === 'changed') {
          filesWhitespaceCleaned++;
          whitespaceLinesCleaned += cleaned.changes;
        }

        const steps = [renamed, emoji, cleaned].filter((step) => step?.status === 'changed').length;
        return {
          path: filePath,
          status: steps > 0 ? 'changed' : 'unchanged',
          changes: steps,
        } satisfies FileOutcome;
      },
      this.logger,
    );

    return {
      filesRenamed,
      filesEmojiTransformed,
      emojiChanges,
      filesWhitespaceCleaned,
      whitespaceLinesCleaned,
      failed: summarize(outcomes).failed,
      outcomes,
    };
  }
}
