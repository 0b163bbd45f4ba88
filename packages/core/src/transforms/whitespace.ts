import { BUILD_DIRECTORIES, FileWalker } from '../files/file-walker.js';
import { FileMutationReporter } from '../files/mutation-reporter.js';
import { type FileOutcome, type RunSummary, processSequentially, summarize } from '../files/run-summary.js';
import { readTextFile } from '../files/text-file.js';
import { type Logger, createLogger } from '../logging/logger.js';

export const DEFAULT_WHITESPACE_EXTENSIONS: readonly string[] = [
  '.py',
  '.pyx',
  '.pxd',
  '.pxi',
  '.c',
  '.h',
  '.cpp',
  '.hpp',
  '.rs',
  '.go',
  '.java',
  '.js',
  '.ts',
  '.jsx',
  '.tsx',
  '.md',
  '.qmd',
  '.txt',
];

export interface WhitespaceOptions {
  readonly extensions?: readonly string[];
  readonly recursive?: boolean;
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

export interface CleanResult {
  readonly text: string;
  /** Lines that lost trailing whitespace. */
  readonly linesChanged: number;
}

/**
 * Trims the end of every line. Output lines are joined with `\n`; a final
 * newline is kept when the input had one.
 */
export function cleanTrailingWhitespace(text: string): CleanResult {
  const endsWithNewline = text.endsWith('\n');
  const lines = text.split(/\r?\n/);
  if (endsWithNewline) {
    lines.pop();
  }

  let linesChanged = 0;
  const cleaned = lines.map((line) => {
    const trimmed = line.trimEnd();
    if (trimmed !== line) {
      linesChanged++;
    }
    return trimmed;
  });

  if (linesChanged === 0) {
    return { text, linesChanged };
  }

  const joined = cleaned.join('\n');
  return { text: endsWithNewline ? `${joined}\n` : joined, linesChanged };
}

export class WhitespaceCleaner {
  private readonly walker: FileWalker;
  private readonly reporter: FileMutationReporter;
  private readonly logger: Logger;

  constructor(options: WhitespaceOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.walker = new FileWalker({
      extensions: options.extensions ?? DEFAULT_WHITESPACE_EXTENSIONS,
      recursive: options.recursive ?? true,
      skipHidden: true,
      ignoreDirectories: BUILD_DIRECTORIES,
      logger: this.logger,
    });
    this.reporter = new FileMutationReporter({
      dryRun: options.dryRun ?? false,
      logger: this.logger,
      messages: {
        changed: (filePath, lines) => `Cleaned ${lines} lines in '${filePath}'`,
        wouldChange: (filePath, lines) => `Would clean ${lines} lines in '${filePath}'`,
      },
    });
  }

  /**
   * Cleans one file if it passes the extension/hidden filters relative to `root`.
   * Returns `undefined` for files the cleaner does not handle.
   */
  /**
   * Processes one file if the walker's filters accept it. `acceptAs` is the path
   * judged by the filters, for a file about to be renamed in a dry run.
   */
  async cleanFile(filePath: string, root: string, acceptAs = filePath): Promise<FileOutcome | undefined> {
    if (!this.walker.accepts(acceptAs, root)) {
      return undefined;
    }
    return this.clean(filePath);
  }

  async process(root: string): Promise<RunSummary> {
    const files = await this.walker.walk(root);
    this.logger.debug(`${files.length} candidate file(s) for whitespace cleaning`);
    const outcomes = await processSequentially(files, (filePath) => this.clean(filePath), this.logger);
    return summarize(outcomes);
  }

  private async clean(filePath: string): Promise<FileOutcome> {
    const content = await readTextFile(filePath);
    const result = cleanTrailingWhitespace(content);
    return this.reporter.commit(filePath, content, result.text, result.linesChanged);
  }
}
