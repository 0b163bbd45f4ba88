import { describe, expect, it } from 'vitest';

import { type FileOutcome, processSequentially, summarize } from '../../src/files/run-summary.js';
import { createCaptureLogger } from '../fixtures/capture-logger.js';

describe('processSequentially', () => {
  it('records a failing file and carries on with the rest', async () => {
    const logger = createCaptureLogger();
    const seen: string[] = [];

    const outcomes = await processSequentially(
      ['a', 'b', 'c'],
      async (filePath): Promise<FileOutcome> => {
        seen.push(filePath);
        if (filePath === 'b') {
          throw new Error('disk on fire');
        }
        return { path: filePath, status: 'changed', changes: 2 };
      },
      logger,
    );

    expect(seen).toEqual(['a', 'b', 'c']);
    expect(outcomes[1]).toEqual({ path: 'b', status: 'failed', changes: 0, error: 'disk on fire' });
    expect(logger.messages('error')).toEqual(["Error processing file 'b': disk on fire"]);
  });
});

describe('summarize', () => {
  it('counts outcomes by status and totals changes of changed files', () => {
    const summary = summarize([
      { path: 'a', status: 'changed', changes: 2 },
      { path: 'b', status: 'changed', changes: 5 },
      { path: 'c', status: 'unchanged', changes: 0 },
      { path: 'd', status: 'failed', changes: 0, error: 'boom' },
    ]);

    expect(summary.changed).toBe(2);
    expect(summary.unchanged).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.changes).toBe(7);
    expect(summary.outcomes).toHaveLength(4);
  });
});
