import { rename, stat } from 'node:fs/promises';
import path from 'node:path';

import { RefmtError } from '../errors.js';
import { FileWalker, deepestFirst } from '../files/file-walker.js';
import { type FileOutcome, type RunSummary, processSequentially, summarize } from '../files/run-summary.js';
import { type Logger, createLogger } from '../logging/logger.js';

export type CaseTransform = 'lowercase' | 'uppercase' | 'capitalize' | 'none';
export type SeparatorReplace = 'underscore' | 'hyphen' | 'none';
export type TimestampFormat = 'long' | 'short' | 'none';

export interface FileNameRules {
  readonly caseTransform?: CaseTransform;
  readonly separator?: SeparatorReplace;
  readonly addPrefix?: string;
  readonly removePrefix?: string;
  /** Added before the extension. */
  readonly addSuffix?: string;
  readonly removeSuffix?: string;
  readonly timestamp?: TimestampFormat;
  /** Lowercase the extension as well as the stem. */
  readonly lowercaseExtension?: boolean;
}

export interface RenameOptions extends FileNameRules {
  readonly recursive?: boolean;
  readonly dryRun?: boolean;
  readonly logger?: Logger;
  /** Clock used for timestamp prefixes. */
  readonly now?: () => Date;
}

export interface RenameOutcome extends FileOutcome {
  /** Path the file lives at after this step; the original path in dry-run mode. */
  readonly currentPath: string;
  /** Path the file is (or in dry-run mode would be) renamed to. */
  readonly targetPath: string;
}

const TIMESTAMP_SHAPES: Record<Exclude<TimestampFormat, 'none'>, RegExp> = {
  long: /^\d{8}_/,
  short: /^\d{6}_/,
};

function formatTimestamp(format: Exclude<TimestampFormat, 'none'>, date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const year = String(date.getFullYear());
  const stamp = `${format === 'long' ? year : year.slice(-2)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `${stamp}_`;
}

function capitalize(value: string): string {
  const [first, ...rest] = Array.from(value);
  return first === undefined ? value : first.toUpperCase() + rest.join('').toLowerCase();
}

function applyCase(value: string, transform: CaseTransform): string {
  switch (transform) {
    case 'lowercase':
      return value.toLowerCase();
    case 'uppercase':
      return value.toUpperCase();
    case 'capitalize':
      return capitalize(value);
    case 'none':
      return value;
  }
}

function applySeparator(value: string, separator: SeparatorReplace): string {
  switch (separator) {
    case 'underscore':
      return value.replace(/[ -]/g, '_');
    case 'hyphen':
      return value.replace(/[ _]/g, '-');
    case 'none':
      return value;
  }
}

/**
 * Computes the new name for `fileName`. Only the stem (everything before the last
 * `.`) is transformed; the extension is carried over as is unless
 * `lowercaseExtension` is set.
 *
 * @example
 * transformFileName('My Report-v2.TXT', { separator: 'underscore', caseTransform: 'lowercase' })
 * // 'my_report_v2.TXT'
 */
export function transformFileName(fileName: string, rules: FileNameRules, now: Date = new Date()): string {
  const dot = fileName.lastIndexOf('.');
  const rawExtension = dot === -1 ? undefined : fileName.slice(dot + 1);
  const extension = rules.lowercaseExtension ? rawExtension?.toLowerCase() : rawExtension;
  let stem = dot === -1 ? fileName : fileName.slice(0, dot);

  if (rules.removePrefix && stem.startsWith(rules.removePrefix)) {
    stem = stem.slice(rules.removePrefix.length);
  }
  if (rules.removeSuffix && stem.endsWith(rules.removeSuffix)) {
    stem = stem.slice(0, stem.length - rules.removeSuffix.length);
  }
  stem = applySeparator(stem, rules.separator ?? 'none');
  stem = applyCase(stem, rules.caseTransform ?? 'none');
  if (rules.addPrefix) {
    stem = `${rules.addPrefix}${stem}`;
  }
  if (rules.addSuffix) {
    stem = `${stem}${rules.addSuffix}`;
  }

  const timestamp = rules.timestamp ?? 'none';
  if (timestamp !== 'none' && !TIMESTAMP_SHAPES[timestamp].test(stem)) {
    stem = `${formatTimestamp(timestamp, now)}${stem}`;
  }

  return extension === undefined ? stem : `${stem}.${extension}`;
}

async function isSameFile(a: string, b: string): Promise<boolean> {
  const [left, right] = await Promise.all([stat(a), stat(b)]);
  return left.dev === right.dev && left.ino === right.ino;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class FileRenamer {
  private readonly rules: FileNameRules;
  private readonly walker: FileWalker;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RenameOptions = {}) {
    this.rules = {
      caseTransform: options.caseTransform,
      separator: options.separator,
      addPrefix: options.addPrefix,
      removePrefix: options.removePrefix,
      addSuffix: options.addSuffix,
      removeSuffix: options.removeSuffix,
      timestamp: options.timestamp,
      lowercaseExtension: options.lowercaseExtension,
    };
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger();
    this.walker = new FileWalker({
      recursive: options.recursive ?? true,
      skipHidden: true,
      logger: this.logger,
    });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Renames one file in place. Hidden files are left alone, and an existing file
   * at the target is never overwritten unless it is the same file (a case-only
   * rename on a case-insensitive file system).
   */
  async renameFile(filePath: string): Promise<RenameOutcome> {
    const fileName = path.basename(filePath);
    const unchanged: RenameOutcome = {
      path: filePath,
      status: 'unchanged',
      changes: 0,
      currentPath: filePath,
      targetPath: filePath,
    };
    if (fileName.startsWith('.')) {
      return unchanged;
    }

    const newName = transformFileName(fileName, this.rules, this.now());
    if (newName === fileName) {
      return unchanged;
    }

    const target = path.join(path.dirname(filePath), newName);
    if ((await exists(target)) && !(await isSameFile(filePath, target))) {
      throw new RefmtError(`Target file already exists: '${target}'`);
    }

    if (this.dryRun) {
      this.logger.info(`Would rename '${filePath}' -> '${target}'`);
      return { path: filePath, status: 'changed', changes: 1, currentPath: filePath, targetPath: target };
    }

    await rename(filePath, target);
    this.logger.info(`Renamed '${filePath}' -> '${target}'`);
    return { path: filePath, status: 'changed', changes: 1, currentPath: target, targetPath: target };
  }

  async process(root: string): Promise<RunSummary> {
    const files = deepestFirst(await this.walker.walk(root));
    this.logger.debug(`${files.length} candidate file(s) for renaming`);
    const outcomes = await processSequentially(files, (filePath) => this.renameFile(filePath), this.logger);
    return summarize(outcomes);
  }
}
