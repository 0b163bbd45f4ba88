import { DEFAULT_CONVERT_EXTENSIONS, FileWalker } from '../files/file-walker.js';
import { FileMutationReporter } from '../files/mutation-reporter.js';
import { type FileOutcome, type RunSummary, processSequentially, summarize } from '../files/run-summary.js';
import { readTextFile } from '../files/text-file.js';
import { type Logger, createLogger } from '../logging/logger.js';
import { caseStyleLabel } from './case-style.js';
import { type MatchOutcome, type RewriteJob, type RewriteJobOptions, createRewriteJob, rewriteText } from './rewrite-job.js';

export interface CaseConverterOptions extends RewriteJobOptions {
  readonly extensions?: readonly string[];
  readonly recursive?: boolean;
  readonly dryRun?: boolean;
  readonly glob?: string;
  readonly logger?: Logger;
}

/**
 * Rewrites identifiers from one case style to another across a file or tree.
 *
 * All validation happens in the constructor, so a bad word filter or glob is
 * reported before any file is touched.
 *
 * @example
 * const converter = new CaseConverter({ from: 'camel', to: 'snake', recursive: true });
 * const summary = await converter.process('./src');
 */
export class CaseConverter {
  readonly job: RewriteJob;
  private readonly walker: FileWalker;
  private readonly reporter: FileMutationReporter;
  private readonly logger: Logger;

  constructor(options: CaseConverterOptions) {
    this.logger = options.logger ?? createLogger();
    this.job = createRewriteJob(options);
    this.walker = new FileWalker({
      extensions: options.extensions ?? DEFAULT_CONVERT_EXTENSIONS,
      recursive: options.recursive ?? false,
      glob: options.glob,
      logger: this.logger,
    });
    this.reporter = new FileMutationReporter({
      dryRun: options.dryRun ?? false,
      logger: this.logger,
      messages: {
        changed: (filePath) => `Converted '${filePath}'`,
        wouldChange: (filePath) => `Would convert '${filePath}'`,
        unchanged: (filePath) => `No changes needed in '${filePath}'`,
      },
    });
  }

  convertText(text: string): MatchOutcome {
    return rewriteText(this.job, text);
  }

  async processFile(filePath: string): Promise<FileOutcome> {
    const content = await readTextFile(filePath);
    const outcome = this.convertText(content);
    this.logger.debug(
      `${filePath}: ${outcome.matches} ${caseStyleLabel(this.job.from)} token(s), ${outcome.replacements} rewritten`,
    );
    return this.reporter.commit(filePath, content, outcome.text, outcome.replacements);
  }

  async process(root: string): Promise<RunSummary> {
    this.logger.debug(
      `Converting from ${caseStyleLabel(this.job.from)} to ${caseStyleLabel(this.job.to)} in ${root}`,
    );
    const files = await this.walker.walk(root);
    this.logger.debug(`${files.length} candidate file(s)`);
    const outcomes = await processSequentially(files, (filePath) => this.processFile(filePath), this.logger);
    return summarize(outcomes);
  }
}
