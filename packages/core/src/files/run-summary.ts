import { errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export type FileStatus = 'changed' | 'unchanged' | 'failed';

export interface FileOutcome {
  readonly path: string;
  readonly status: FileStatus;
  /** Transformer-specific count: lines cleaned, emoji replaced, identifiers rewritten. */
  readonly changes: number;
  readonly error?: string;
}

export interface RunSummary {
  readonly outcomes: readonly FileOutcome[];
  readonly changed: number;
  readonly unchanged: number;
  readonly failed: number;
  readonly changes: number;
}

/**
 * Runs `handler` over the files one at a time. A failing file is logged and
 * recorded; the rest of the run carries on.
 */
export async function processSequentially(
  files: readonly string[],
  handler: (filePath: string) => Promise<FileOutcome>,
  logger: Logger,
): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];

  for (const filePath of files) {
    try {
      outcomes.push(await handler(filePath));
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Error processing file '${filePath}': ${message}`);
      outcomes.push({ path: filePath, status: 'failed', changes: 0, error: message });
    }
  }

  return outcomes;
}

export function summarize(outcomes: readonly FileOutcome[]): RunSummary {
  let changed = 0;
  let unchanged = 0;
  let failed = 0;
  let changes = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'changed':
        changed++;
        changes += outcome.changes;
        break;
      case 'unchanged':
        unchanged++;
        break;
      case 'failed':
        failed++;
        break;
    }
  }

  return { outcomes, changed, unchanged, failed, changes };
}
