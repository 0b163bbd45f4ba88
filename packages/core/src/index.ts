export * from './errors.js';
export * from './logging/logger.js';
export * from './config/config.js';
export * from './case/case-style.js';
export * from './case/rewrite-job.js';
export * from './case/case-converter.js';
export * from './files/file-walker.js';
export * from './files/mutation-reporter.js';
export * from './files/run-summary.js';
export * from './files/text-file.js';
export * from './transforms/whitespace.js';
export * from './transforms/emoji.js';
export * from './transforms/rename.js';
export * from './transforms/combined.js';
