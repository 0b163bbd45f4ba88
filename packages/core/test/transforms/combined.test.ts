import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CombinedProcessor } from '../../src/transforms/combined.js';
import { createCaptureLogger } from '../fixtures/capture-logger.js';

describe('CombinedProcessor', () => {
  let root: string;

  const write = async (relative: string, content: string) => {
    const filePath = path.join(root, relative);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf8');
    return filePath;
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'refmt-combined-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('renames, then transforms emojis and cleans whitespace at the new path', async () => {
    const original = await write('Notes.md', '✅ done  \n');
    const renamed = path.join(root, 'notes.md');
    const logger = createCaptureLogger();

    const stats = await new CombinedProcessor({ logger }).process(root);

    expect(stats).toMatchObject({
      filesRenamed: 1,
      filesEmojiTransformed: 1,
      emojiChanges: 1,
      filesWhitespaceCleaned: 1,
      whitespaceLinesCleaned: 1,
      failed: 0,
    });
    expect(await readdir(root)).toEqual(['notes.md']);
    expect(await readFile(renamed, 'utf8')).toBe('[x] done\n');
    expect(logger.messages('info')).toEqual([
      `Renamed '${original}' -> '${renamed}'`,
      `Transformed emojis in '${renamed}'`,
      `Cleaned 1 lines in '${renamed}'`,
    ]);
  });

  it('touches nothing in dry-run mode but still counts every step', async () => {
    const file = await write('Notes.md', '✅ done  \n');

    const stats = await new CombinedProcessor({ dryRun: true, logger: createCaptureLogger() }).process(root);

    expect(stats.filesRenamed).toBe(1);
    expect(stats.filesEmojiTransformed).toBe(1);
    expect(stats.filesWhitespaceCleaned).toBe(1);
    expect(await readdir(root)).toEqual(['Notes.md']);
    expect(await readFile(file, 'utf8')).toBe('✅ done  \n');
  });

  it('skips hidden paths and build directories', async () => {
    const hidden = await write('.github/README.md', '✅  \n');
    const built = await write('build/Out.txt', 'x  \n');

    const stats = await new CombinedProcessor({ logger: createCaptureLogger() }).process(root);

    expect(stats.outcomes).toEqual([]);
    expect(await readFile(hidden, 'utf8')).toBe('✅  \n');
    expect(await readFile(built, 'utf8')).toBe('x  \n');
  });

  it('accepts a single file as the root', async () => {
    const file = await write('Todo.txt', 'item  \n');

    const stats = await new CombinedProcessor({ logger: createCaptureLogger() }).process(file);

    expect(stats.filesRenamed).toBe(1);
    expect(stats.whitespaceLinesCleaned).toBe(1);
    expect(await readFile(path.join(root, 'todo.txt'), 'utf8')).toBe('item\n');
  });

  it('only lowercases files whose content needs nothing else', async () => {
    await write('Image.PNG', 'binary-ish');

    const stats = await new CombinedProcessor({ logger: createCaptureLogger() }).process(root);

    expect(stats.filesRenamed).toBe(1);
    expect(stats.filesEmojiTransformed).toBe(0);
    expect(stats.filesWhitespaceCleaned).toBe(0);
    expect(await readdir(root)).toEqual(['image.png']);
  });

  it('lowercases the extension so the content passes are not skipped', async () => {
    await write('README.MD', 'done ✅  \n');

    const stats = await new CombinedProcessor({ logger: createCaptureLogger() }).process(root);

    expect(await readdir(root)).toEqual(['readme.md']);
    expect(await readFile(path.join(root, 'readme.md'), 'utf8')).toBe('done [x]\n');
    expect(stats).toMatchObject({
      filesRenamed: 1,
      filesEmojiTransformed: 1,
      filesWhitespaceCleaned: 1,
      whitespaceLinesCleaned: 1,
    });
  });

  it('judges the planned name in dry-run mode', async () => {
    const file = await write('README.MD', 'done ✅  \n');
    const logger = createCaptureLogger();

    const stats = await new CombinedProcessor({ dryRun: true, logger }).process(root);

    expect(stats.filesRenamed).toBe(1);
    expect(stats.filesEmojiTransformed).toBe(1);
    expect(stats.filesWhitespaceCleaned).toBe(1);
    expect(await readFile(file, 'utf8')).toBe('done ✅  \n');
    expect(logger.messages('info')).toEqual([
      `Would rename '${file}' -> '${path.join(root, 'readme.md')}'`,
      `Would transform emojis in '${file}'`,
      `Would clean 1 lines in '${file}'`,
    ]);
  });
});
