/**
 * BatchProcessor
 *
 * Rescales many files with a concurrency limit.
 * Collects all results without stopping on individual failures.
 */

import type { IesFilePipeline } from '../pipeline/file-pipeline.js';
import { ErrorHandler } from '../errors/index.js';
import { ProgressReporter } from './progress.js';

export interface BatchJob {
  input: string;
  output: string;
  coneAngle: number;
  preserveIntensity?: boolean;
}

export interface BatchResult {
  input: string;
  output: string;
  success: boolean;
  error?: string;
  durationMs: number;
  bytesWritten: number;
}

export class BatchProcessor {
  constructor(
    private pipeline: IesFilePipeline,
    private reporter: ProgressReporter,
    private concurrency: number = 4
  ) {}

  /** Results come back in job order. */
  async processBatch(jobs: BatchJob[]): Promise<BatchResult[]> {
    const results = new Array<BatchResult>(jobs.length);
    let next = 0;

    const runWorker = async (): Promise<void> => {
      while (next < jobs.length) {
        const index = next++;
        results[index] = await this.processJob(jobs[index]);
      }
    };

    const workers: Promise<void>[] = [];
    const workerCount = Math.min(Math.max(1, this.concurrency), jobs.length);
    for (let i = 0; i < workerCount; i++) {
      workers.push(runWorker());
    }
    await Promise.all(workers);

    return results;
  }

  private async processJob(job: BatchJob): Promise<BatchResult> {
    const start = Date.now();
    const task = `Rescale ${job.input} (${job.coneAngle}°)`;
    this.reporter.startTask(task);
    try {
      const { bytesWritten } = await this.pipeline.rescaleFile(job.input, job.output, {
        coneAngle: job.coneAngle,
        preserveIntensity: job.preserveIntensity,
      });
      this.reporter.completeTask(task);
      this.reporter.logWritten(job.output, bytesWritten);
      return { input: job.input, output: job.output, success: true, durationMs: Date.now() - start, bytesWritten };
    } catch (err) {
      const error = ErrorHandler.normalize(err);
      this.reporter.failTask(task, error);
      return {
        input: job.input,
        output: job.output,
        success: false,
        error: ErrorHandler.toUserMessage(error),
        durationMs: Date.now() - start,
        bytesWritten: 0,
      };
    }
  }
}
