/**
 * CLI module: commands, output formatting and batch runs.
 */

export { IesnaCLI } from './cli.js';
export { OutputFormatter } from './formatter.js';
export { ProgressReporter } from './progress.js';
export { BatchProcessor } from './batch-processor.js';
export type { BatchJob, BatchResult } from './batch-processor.js';
