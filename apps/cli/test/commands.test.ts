import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCli } from '../src/index.js';

describe('refmt commands', () => {
  let root: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  const originalIsTTY = process.stdout.isTTY;

  const write = async (relative: string, content: string | Buffer) => {
    const filePath = path.join(root, relative);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
    return filePath;
  };

  const refmt = (...args: string[]) => runCli(['node', 'refmt', ...args]);
  const printed = () => log.mock.calls.map((call) => call.join(' '));
  const errors = () => error.mock.calls.map((call) => call.join(' '));

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'refmt-cli-'));
    process.stdout.isTTY = false;
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.stdout.isTTY = originalIsTTY;
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  it('runs the combined pass when given only a path', async () => {
    const original = await write('Notes.md', '✅ done  \n');
    const renamed = path.join(root, 'notes.md');

    await refmt(root, '-r');

    expect(await readFile(renamed, 'utf8')).toBe('[x] done\n');
    expect(printed()).toEqual([
      `Renamed '${original}' -> '${renamed}'`,
      `Transformed emojis in '${renamed}'`,
      `Cleaned 1 lines in '${renamed}'`,
      [
        'Processed files:',
        '  - Renamed: 1 file(s)',
        '  - Emoji transformations: 1 file(s) (1 changes)',
        '  - Whitespace cleaned: 1 file(s) (1 lines)',
      ].join('\n'),
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('converts identifiers', async () => {
    const file = await write('app.ts', 'const userName = getUserName();\n');

    await refmt('convert', '--from-camel', '--to-snake', root);

    expect(await readFile(file, 'utf8')).toBe('const user_name = get_user_name();\n');
    expect(printed()).toEqual([`Converted '${file}'`, 'Converted 1 file(s)']);
  });

  it('leaves files untouched in a dry run', async () => {
    const file = await write('app.ts', 'const userName = 1;\n');

    await refmt('convert', '--from-camel', '--to-kebab', '-d', root);

    expect(await readFile(file, 'utf8')).toBe('const userName = 1;\n');
    expect(printed()).toEqual([`Would convert '${file}'`, '[DRY-RUN] Would convert 1 file(s)']);
  });

  it('requires exactly one source style', async () => {
    const file = await write('app.ts', 'const userName = 1;\n');

    await refmt('convert', '--from-camel', '--from-pascal', '--to-snake', root);

    expect(errors()).toEqual(['Error: exactly one source style must be chosen']);
    expect(process.exitCode).toBe(1);
    expect(await readFile(file, 'utf8')).toBe('const userName = 1;\n');
  });

  it('rejects replace-prefix-to without replace-prefix-from', async () => {
    await refmt('convert', '--from-camel', '--to-snake', '--replace-prefix-to', 'x', root);

    expect(errors()).toEqual([
      'Error: Invalid conversion options: replacePrefixTo: replace-prefix-to requires replace-prefix-from',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('exits non-zero when the path does not exist', async () => {
    const missing = path.join(root, 'missing');

    await refmt('clean', missing);

    expect(errors()).toEqual([`Error: Path '${missing}' does not exist.`]);
    expect(process.exitCode).toBe(1);
  });

  it('exits non-zero when a file fails', async () => {
    const bad = await write('bad.py', Buffer.from([0xff, 0xfe]));

    await refmt('clean', root);

    expect(errors()).toEqual([`Error processing file '${bad}': File is not valid UTF-8 text`]);
    expect(printed()).toEqual(['No files needed cleaning\n1 file(s) failed']);
    expect(process.exitCode).toBe(1);
  });

  it('prints nothing but errors when quiet', async () => {
    await write('a.py', 'x = 1  \n');

    await refmt('clean', '-q', root);

    expect(printed()).toEqual([]);
  });

  it('honours the extension list', async () => {
    const notes = await write('notes.txt', 'a  \n');
    const code = await write('code.py', 'b  \n');

    await refmt('clean', '-e', 'txt', root);

    expect(await readFile(notes, 'utf8')).toBe('a\n');
    expect(await readFile(code, 'utf8')).toBe('b  \n');
  });

  it('reads defaults from a config file', async () => {
    const nested = await write('sub/a.py', 'x = 1  \n');
    const config = await write('settings.yaml', 'clean:\n  recursive: false\n');

    await refmt('clean', '--config', config, root);

    expect(await readFile(nested, 'utf8')).toBe('x = 1  \n');
    expect(printed()).toEqual(['No files needed cleaning']);
  });

  it('takes conversion styles from the config file when no flag is given', async () => {
    const file = await write('app.ts', 'const userName = 1;\n');
    const config = await write('settings.yaml', 'convert:\n  from: camelCase\n  to: kebab-case\n');

    await refmt('convert', '--config', config, root);

    expect(await readFile(file, 'utf8')).toBe('const user-name = 1;\n');
    expect(printed()).toEqual([`Converted '${file}'`, 'Converted 1 file(s)']);
    expect(process.exitCode).toBeUndefined();
  });

  it('keeps other emojis on request', async () => {
    const file = await write('todo.md', '☐ launch \u{1F680}\n');

    await refmt('emojis', '--keep-other-emojis', root);

    expect(await readFile(file, 'utf8')).toBe('[ ] launch \u{1F680}\n');
    expect(printed()).toEqual([`Transformed emojis in '${file}'`, 'Transformed emojis in 1 file(s) (1 changes)']);
  });

  it('renames files', async () => {
    const file = await write('My Notes.txt', 'x');

    await refmt('rename_files', '--to-lowercase', '--hyphenated', root);

    expect(await readdir(root)).toEqual(['my-notes.txt']);
    expect(printed()).toEqual([
      `Renamed '${file}' -> '${path.join(root, 'my-notes.txt')}'`,
      'Renamed 1 file(s)',
    ]);
  });

  it('writes a log file', async () => {
    await write('a.py', 'x = 1  \n');
    const logFile = path.join(root, 'refmt.log');

    await refmt('clean', '--no-recursive', '--log-file', logFile, root);

    const contents = await readFile(logFile, 'utf8');
    expect(contents).toMatch(/\[INFO\] Cleaned 1 lines in 1 file\(s\)\n$/);
  });
});
