import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import micromatch from 'micromatch';

import { ConfigurationError, PathNotFoundError, errorMessage } from '../errors.js';
import { type Logger, createLogger } from '../logging/logger.js';

export const DEFAULT_CONVERT_EXTENSIONS: readonly string[] = [
  '.c',
  '.h',
  '.py',
  '.md',
  '.js',
  '.ts',
  '.java',
  '.cpp',
  '.hpp',
];

/** Directory names the cleaning transformers never descend into. */
export const BUILD_DIRECTORIES: readonly string[] = [
  'build',
  '__pycache__',
  '.git',
  'node_modules',
  'venv',
  '.venv',
  'target',
];

export interface FileWalkerOptions {
  /** Accepted suffixes including the leading dot. Omit to accept every file. */
  readonly extensions?: readonly string[];
  readonly recursive?: boolean;
  /** Matched against the bare file name or the path relative to the walk root. */
  readonly glob?: string;
  /** Skip files whose relative path has a segment starting with `.`. */
  readonly skipHidden?: boolean;
  readonly ignoreDirectories?: readonly string[];
  /** Receives a warning for each directory the walk cannot enter. */
  readonly logger?: Logger;
}

/**
 * Produces the candidate files for a transformer.
 */
export class FileWalker {
  private readonly extensions?: ReadonlySet<string>;
  private readonly recursive: boolean;
  private readonly glob?: string;
  private readonly skipHidden: boolean;
  private readonly ignoreDirectories: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: FileWalkerOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.extensions = options.extensions ? new Set(options.extensions) : undefined;
    this.recursive = options.recursive ?? false;
    this.skipHidden = options.skipHidden ?? false;
    this.ignoreDirectories = new Set(options.ignoreDirectories ?? []);

    if (options.glob !== undefined) {
      validateGlob(options.glob);
      this.glob = options.glob;
    }
  }

  /**
   * Lists candidate files under `root`, sorted. A file root yields itself when it
   * passes the filters, whatever the recursion setting.
   *
   * @throws PathNotFoundError when `root` does not exist
   */
  async walk(root: string): Promise<string[]> {
    const stats = await stat(root).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        throw new PathNotFoundError(root);
      }
      throw error;
    });

    if (stats.isFile()) {
      return this.accepts(root, path.dirname(root)) ? [root] : [];
    }

    // Unreadable directories are skipped rather than failing the whole walk.
    const entries = await fg(this.recursive ? '**/*' : '*', {
      cwd: root,
      onlyFiles: false,
      objectMode: true,
      dot: !this.skipHidden,
      followSymbolicLinks: false,
      suppressErrors: true,
      ignore: [...this.ignoreDirectories].map((dir) => `**/${dir}/**`),
    });

    const files: string[] = [];
    for (const entry of entries) {
      if (entry.dirent.isFile()) {
        files.push(entry.path);
      } else if (this.recursive && entry.dirent.isDirectory()) {
        await this.warnIfUnreadable(root, entry.path);
      }
    }

    return files
      .sort()
      .map((entry) => path.join(root, entry))
      .filter((filePath) => this.accepts(filePath, root));
  }

  /**
   * Applies the extension, glob, hidden and ignored-directory filters to one path.
   */
  accepts(filePath: string, root: string): boolean {
    const relative = path.relative(root, filePath) || path.basename(filePath);
    const segments = relative.split(path.sep);
    const fileName = path.basename(filePath);

    if (this.skipHidden && segments.some((segment) => segment.startsWith('.'))) {
      return false;
    }
    if (segments.slice(0, -1).some((segment) => this.ignoreDirectories.has(segment))) {
      return false;
    }
    if (this.extensions) {
      const extension = path.extname(fileName);
      if (extension === '' || !this.extensions.has(extension)) {
        return false;
      }
    }
    if (this.glob !== undefined) {
      const posixRelative = segments.join('/');
      return (
        micromatch.isMatch(fileName, this.glob, { dot: true }) ||
        micromatch.isMatch(posixRelative, this.glob, { dot: true })
      );
    }
    return true;
  }

  private async warnIfUnreadable(root: string, relative: string): Promise<void> {
    if (relative.split('/').some((segment) => this.ignoreDirectories.has(segment))) {
      return;
    }
    const directory = path.join(root, relative);
    try {
      await access(directory, constants.R_OK | constants.X_OK);
    } catch (error) {
      this.logger.warn(`Skipping directory '${directory}': ${errorMessage(error)}`);
    }
  }
}

/**
 * Splits repeatable/comma-separated extension arguments and adds the leading dot
 * where it was left out.
 */
export function normalizeExtensions(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value !== '')
    .map((value) => (value.startsWith('.') ? value : `.${value}`));
}

/**
 * Orders paths so that files in deeper directories come first, which keeps a
 * rename in one file from invalidating paths collected for the others.
 */
export function deepestFirst(paths: readonly string[]): string[] {
  const depth = (filePath: string) => filePath.split(path.sep).length;
  return [...paths].sort((a, b) => depth(b) - depth(a) || (a < b ? -1 : a > b ? 1 : 0));
}

function validateGlob(glob: string): void {
  if (glob.trim() === '') {
    throw new ConfigurationError('Invalid glob pattern: pattern is empty');
  }
  try {
    micromatch.makeRe(glob, { strictBrackets: true });
  } catch (error) {
    throw new ConfigurationError(`Invalid glob pattern '${glob}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
