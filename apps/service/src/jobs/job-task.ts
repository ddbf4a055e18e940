import { describeError } from '@scriptforge/core';
import { createJobId, type JobOutcome, type JobStreamEvent } from '@scriptforge/core/jobs';

import { runScrapingJob, type ScrapingJobOptions } from '../orchestrator/index.js';
import { ProgressChannel } from './progress-channel.js';

export interface StartJobTaskOptions extends Omit<ScrapingJobOptions, 'onProgress' | 'signal'> {
  readonly progressCapacity?: number;
}

/** A running job. `completion` resolves with the terminal outcome and never rejects. */
export interface JobTask {
  readonly jobId: string;
  readonly completion: Promise<JobOutcome>;
  events(): AsyncIterable<JobStreamEvent>;
  cancel(): void;
}

export const startJobTask = (options: StartJobTaskOptions): JobTask => {
  const { progressCapacity, ...jobOptions } = options;
  const jobId = options.jobId ?? createJobId();
  const channel = new ProgressChannel({ capacity: progressCapacity });
  const controller = new AbortController();

  const completion = runScrapingJob({
    ...jobOptions,
    jobId,
    signal: controller.signal,
    onProgress: (line) => channel.publishLog(line)
  })
    .catch((error: unknown): JobOutcome => {
      options.logger.error('Scraping job aborted unexpectedly', { jobId, error: describeError(error) });
      return {
        jobId,
        state: 'failed',
        result: { status: 'error', message: `Unexpected error occurred: ${describeError(error)}` },
        attempts: []
      };
    })
    .then((outcome) => {
      channel.close(outcome.result);
      return outcome;
    });

  return {
    jobId,
    completion,
    events: () => channel,
    cancel: () => {
      if (!controller.signal.aborted) {
        options.logger.info('Cancelling scraping job', { jobId });
        controller.abort();
      }
    }
  };
};
