import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { WhitespaceCleaner, cleanTrailingWhitespace } from '../../src/transforms/whitespace.js';
import { createCaptureLogger } from '../fixtures/capture-logger.js';

describe('cleanTrailingWhitespace', () => {
  it('trims each line and counts the lines that changed', () => {
    expect(cleanTrailingWhitespace('a  \nb\t\nc\n')).toEqual({ text: 'a\nb\nc\n', linesChanged: 2 });
  });

  it('keeps a missing final newline missing', () => {
    expect(cleanTrailingWhitespace('x  ')).toEqual({ text: 'x', linesChanged: 1 });
  });

  it('returns clean text as is, line endings included', () => {
    expect(cleanTrailingWhitespace('a\r\nb\r\n')).toEqual({ text: 'a\r\nb\r\n', linesChanged: 0 });
    expect(cleanTrailingWhitespace('')).toEqual({ text: '', linesChanged: 0 });
  });

  it('normalizes CRLF to LF when a line is cleaned', () => {
    expect(cleanTrailingWhitespace('a \r\nb\r\n')).toEqual({ text: 'a\nb\n', linesChanged: 1 });
  });

  it('empties whitespace-only lines', () => {
    expect(cleanTrailingWhitespace('  \n')).toEqual({ text: '\n', linesChanged: 1 });
  });
});

describe('WhitespaceCleaner', () => {
  let root: string;

  const write = async (relative: string, content: string) => {
    const filePath = path.join(root, relative);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf8');
    return filePath;
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'refmt-clean-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('cleans source files recursively, skipping hidden and build paths', async () => {
    const source = await write('src/main.py', 'x = 1  \ny = 2\t\n');
    const hidden = await write('.venv/lib.py', 'z = 3  \n');
    const vendored = await write('node_modules/dep/index.js', 'let a;  \n');
    const binary = await write('data.bin', 'raw  \n');
    const logger = createCaptureLogger();

    const summary = await new WhitespaceCleaner({ logger }).process(root);

    expect(summary.changed).toBe(1);
    expect(summary.changes).toBe(2);
    expect(await readFile(source, 'utf8')).toBe('x = 1\ny = 2\n');
    expect(await readFile(hidden, 'utf8')).toBe('z = 3  \n');
    expect(await readFile(vendored, 'utf8')).toBe('let a;  \n');
    expect(await readFile(binary, 'utf8')).toBe('raw  \n');
    expect(logger.messages('info')).toEqual([`Cleaned 2 lines in '${source}'`]);
  });

  it('only reports in dry-run mode', async () => {
    const file = await write('notes.md', 'todo  \n');
    const logger = createCaptureLogger();

    const summary = await new WhitespaceCleaner({ dryRun: true, logger }).process(root);

    expect(summary.changed).toBe(1);
    expect(await readFile(file, 'utf8')).toBe('todo  \n');
    expect(logger.messages('info')).toEqual([`Would clean 1 lines in '${file}'`]);
  });

  it('stays at the top level when not recursive', async () => {
    await write('sub/deep.txt', 'a \n');
    const top = await write('top.txt', 'b \n');

    const summary = await new WhitespaceCleaner({ recursive: false, logger: createCaptureLogger() }).process(root);

    expect(summary.outcomes.map((outcome) => outcome.path)).toEqual([top]);
  });

  it('skips single files it does not handle', async () => {
    const file = await write('image.png', 'a  \n');
    expect(await new WhitespaceCleaner({ logger: createCaptureLogger() }).cleanFile(file, root)).toBeUndefined();
  });
});
