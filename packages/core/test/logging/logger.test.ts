import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createLogger, resolveLogLevel } from '../../src/logging/logger.js';

describe('resolveLogLevel', () => {
  it('maps the quiet and verbose flags', () => {
    expect(resolveLogLevel({})).toBe('info');
    expect(resolveLogLevel({ verbose: true })).toBe('debug');
    expect(resolveLogLevel({ quiet: true })).toBe('error');
    expect(resolveLogLevel({ quiet: true, verbose: true })).toBe('error');
  });
});

describe('createLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'refmt-logger-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('routes messages by level and drops those below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = createLogger({ level: 'info', useColors: false });
    logger.info('hello');
    logger.warn('careful');
    logger.error('broken');
    logger.debug('hidden');

    expect(log.mock.calls).toEqual([['hello']]);
    expect(warn.mock.calls).toEqual([['Warning: careful']]);
    expect(error.mock.calls).toEqual([['broken']]);
  });

  it('prints debug lines at debug level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ level: 'debug', useColors: false }).debug('details');

    expect(error.mock.calls).toEqual([['[debug] details']]);
  });

  it('colours errors when asked', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ level: 'error', useColors: true }).error('broken');

    expect(error.mock.calls).toEqual([['\u001b[31mbroken\u001b[0m']]);
  });

  it('truncates the log file and records every level without colour codes', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logFile = path.join(dir, 'run.log');
    await writeFile(logFile, 'stale\n', 'utf8');

    const logger = createLogger({ level: 'silent', logFile, useColors: false });
    logger.debug('step one');
    logger.info('\u001b[32mdone\u001b[0m');

    const lines = (await readFile(logFile, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[DEBUG\] step one$/);
    expect(lines[1]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[INFO\] done$/);
  });
});
