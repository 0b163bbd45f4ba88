import { writeFile } from 'node:fs/promises';

import type { Logger } from '../logging/logger.js';
import type { FileOutcome } from './run-summary.js';

export interface MutationMessages {
  readonly changed: (filePath: string, changes: number) => string;
  readonly wouldChange: (filePath: string, changes: number) => string;
  /** Printed for untouched files outside dry-run mode; omit to stay quiet. */
  readonly unchanged?: (filePath: string) => string;
}

export interface FileMutationReporterOptions {
  readonly dryRun: boolean;
  readonly logger: Logger;
  readonly messages: MutationMessages;
}

/**
 * Persists a transformed file, or in dry-run mode only says what would change.
 * Identical content is never written.
 */
export class FileMutationReporter {
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly messages: MutationMessages;

  constructor(options: FileMutationReporterOptions) {
    this.dryRun = options.dryRun;
    this.logger = options.logger;
    this.messages = options.messages;
  }

  async commit(filePath: string, original: string, updated: string, changes: number): Promise<FileOutcome> {
    if (original === updated) {
      if (!this.dryRun && this.messages.unchanged) {
        this.logger.info(this.messages.unchanged(filePath));
      }
      return { path: filePath, status: 'unchanged', changes: 0 };
    }

    if (this.dryRun) {
      this.logger.info(this.messages.wouldChange(filePath, changes));
    } else {
      await writeFile(filePath, updated, 'utf8');
      this.logger.info(this.messages.changed(filePath, changes));
    }

    return { path: filePath, status: 'changed', changes };
  }
}
