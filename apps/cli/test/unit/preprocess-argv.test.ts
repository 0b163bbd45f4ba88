import { describe, expect, it } from 'vitest';

import { preprocessArgv } from '../../src/index.js';

describe('preprocessArgv', () => {
  it('inserts `all` when the first argument is a path', () => {
    expect(preprocessArgv(['node', 'refmt', './src'])).toEqual(['node', 'refmt', 'all', './src']);
  });

  it('inserts `all` when the first argument is a command flag', () => {
    expect(preprocessArgv(['node', 'refmt', '-r', './src', '-d'])).toEqual([
      'node',
      'refmt',
      'all',
      '-r',
      './src',
      '-d',
    ]);
  });

  it('passes known subcommands through', () => {
    for (const sub of ['convert', 'clean', 'emojis', 'rename_files', 'all']) {
      expect(preprocessArgv(['node', 'refmt', sub, 'dir'])).toEqual(['node', 'refmt', sub, 'dir']);
    }
  });

  it('leaves help and version requests at the top level', () => {
    expect(preprocessArgv(['node', 'refmt', '--help'])).toEqual(['node', 'refmt', '--help']);
    expect(preprocessArgv(['node', 'refmt', '-h'])).toEqual(['node', 'refmt', '-h']);
    expect(preprocessArgv(['node', 'refmt', '--version'])).toEqual(['node', 'refmt', '--version']);
  });

  it('leaves an empty command line alone', () => {
    expect(preprocessArgv(['node', 'refmt'])).toEqual(['node', 'refmt']);
  });
});
