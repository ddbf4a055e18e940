import type { ArtifactStore } from '@scriptforge/artifact-store';
import {
  BudgetExhausted,
  describeError,
  ExecutionError,
  ExecutionResultSchema,
  isRetryableError,
  OracleError,
  ValidationFailure,
  type ExecutionResult,
  type GeneratedArtifact,
  type JobConfiguration,
  type JobResult,
  type ValidationVerdict
} from '@scriptforge/core';
import {
  assertTransition,
  createJobId,
  downloadReferenceFor,
  IllegalTransitionError,
  type AttemptRecord,
  type Excerpt,
  type FailureRecord,
  type JobLogger,
  type JobOutcome,
  type JobState,
  type ProgressObserver,
  type TerminalJobState
} from '@scriptforge/core/jobs';
import { buildStructuralOutline, expandContext, reduceDocument } from '@scriptforge/document';

import type { GenerationOracle } from '../oracle/types.js';
import type { ExecutionSandbox } from '../sandbox/types.js';
import type { DocumentFetcher } from './fetcher.js';
import { validateOutput } from './validation.js';

export const PREVIEW_LENGTH = 500;
export const DIAGNOSTIC_SAMPLE_LENGTH = 2_000;
export const MANUAL_SETUP_MARKER = /playwright install/i;

export const FAILED_JOB_MESSAGE =
  'The agent failed to generate a working scraper. Please check the website or try a more specific prompt.';
export const SUCCESS_MESSAGE = 'Scraper generated and tested successfully!';
export const ACTION_REQUIRED_MESSAGE =
  "The script requires Playwright. Please run 'npx playwright install' and then run the script from the downloaded zip.";
export const CANCELLED_MESSAGE = 'Scraping job was cancelled.';

export interface ScrapingJobOptions {
  readonly jobId?: string;
  readonly url: string;
  readonly objective: string;
  readonly configuration: JobConfiguration;
  readonly oracle: GenerationOracle;
  readonly sandbox: ExecutionSandbox;
  readonly store: ArtifactStore;
  readonly fetchDocument: DocumentFetcher;
  readonly logger: JobLogger;
  readonly onProgress?: ProgressObserver;
  readonly signal?: AbortSignal;
}

export const truncateSample = (value: string, maxLength: number): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength)}...`;

const executionFailureReason = (execution: ExecutionResult, runTimeoutMs: number): string => {
  switch (execution.kind) {
    case 'install-failed':
      return `Dependency installation failed with exit code ${execution.exitCode}. See STDERR for details.`;
    case 'timed-out':
      return `Script execution timed out after ${Math.round(runTimeoutMs / 1000)} seconds.`;
    case 'completed':
      return `Script execution failed with exit code ${execution.exitCode}. See STDERR for details.`;
  }
};

const executionPhase = (execution: ExecutionResult): ExecutionError['phase'] => {
  switch (execution.kind) {
    case 'install-failed':
      return 'install';
    case 'timed-out':
      return 'timeout';
    case 'completed':
      return 'run';
  }
};

interface AttemptFailure {
  readonly reason: string;
  readonly stdout: string;
  readonly stderr: string;
}

const describeAttemptFailure = (error: unknown): AttemptFailure => {
  if (!isRetryableError(error)) {
    const message = describeError(error);
    return {
      reason: `An unexpected error occurred during script generation or execution: ${message}`,
      stdout: '',
      stderr: message
    };
  }
  if (error instanceof OracleError) {
    return { reason: `Script generation failed: ${error.message}`, stdout: '', stderr: error.message };
  }
  return { reason: error.message, stdout: error.execution.stdout, stderr: error.execution.stderr };
};

/**
 * Drives one scraping job through fetch, reduction and up to
 * `configuration.maxAttempts` generate/execute/validate attempts.
 * Resolves with a terminal outcome; only programming errors reject.
 */
export const runScrapingJob = async (options: ScrapingJobOptions): Promise<JobOutcome> => {
  const { url, objective, configuration, oracle, sandbox, store, logger, signal } = options;
  const jobId = options.jobId ?? createJobId();
  const attempts: AttemptRecord[] = [];
  const history: FailureRecord[] = [];
  let state: JobState = 'fetching';

  const report = (line: string) => {
    logger.info(line, { jobId });
    if (!options.onProgress) {
      return;
    }
    try {
      options.onProgress(line);
    } catch (error) {
      logger.warn('Progress observer failed', { jobId, error: describeError(error) });
    }
  };

  const transition = (next: JobState) => {
    assertTransition(state, next);
    logger.debug('Job state changed', { jobId, from: state, to: next });
    state = next;
  };

  const finish = (terminal: TerminalJobState, result: JobResult): JobOutcome => {
    transition(terminal);
    report(`Scraping job processing finished for run_id: ${jobId}`);
    return Object.freeze({ jobId, state: terminal, result, attempts: Object.freeze([...attempts]) });
  };

  const recordAttempt = (record: AttemptRecord) => {
    attempts.push(Object.freeze(record));
  };

  void store.sweep(configuration.maxArtifactAgeMs).then(
    (swept) => {
      logger.debug('Swept stale artifacts', {
        workspaces: swept.removedWorkspaces.length,
        packages: swept.removedPackages.length
      });
    },
    (error: unknown) => {
      logger.warn('Artifact sweep failed', { error: describeError(error) });
    }
  );

  report(`Starting scraping job with run_id: ${jobId}`);
  report(`Target URL: ${url}`);

  try {
    report(`Fetching content from: ${url}`);
    let html: string;
    try {
      html = await options.fetchDocument(url, { timeoutMs: configuration.timeouts.fetchMs });
    } catch (error) {
      report(`HTTP request error: ${describeError(error)}`);
      return finish('failed', {
        status: 'error',
        message: `Failed to fetch content from URL: ${describeError(error)}`
      });
    }
    report(`Successfully fetched ${html.length} characters from URL`);

    transition('reducing');
    report('Generating HTML structure map...');
    const outline = buildStructuralOutline(html, { logger });
    const reduction = reduceDocument(html, objective, { logger });
    report(`Extracted ${reduction.text.length} characters of relevant content for analysis`);

    transition('generating');
    let previousExcerpt: Excerpt = reduction;
    let previousExpansion: Excerpt | null = null;

    for (let index = 0; index < configuration.maxAttempts; index += 1) {
      if (signal?.aborted) {
        report('Cancellation requested; no further attempts will be started.');
        return finish('failed', { status: 'error', message: CANCELLED_MESSAGE });
      }
      if (state !== 'generating') {
        transition('generating');
      }

      report(`Attempt ${index + 1}/${configuration.maxAttempts}: Generating scraping script...`);

      let excerpt = reduction;
      if (index > 0) {
        report('Expanding HTML context for retry...');
        const expanded = expandContext(html, previousExcerpt.text, { logger });
        excerpt =
          previousExpansion && expanded.text.length < previousExpansion.text.length ? previousExpansion : expanded;
        previousExpansion = excerpt;
        report(`Expanded HTML context to ${excerpt.text.length} characters.`);
      }
      previousExcerpt = excerpt;

      let artifact: GeneratedArtifact | null = null;
      let execution: ExecutionResult | null = null;
      let verdict: ValidationVerdict | null = null;

      try {
        artifact = await oracle.generate(
          {
            objective,
            url,
            excerpt: excerpt.text,
            structuralOutline: index === 0 ? outline : undefined,
            failureHistory: history.slice()
          },
          { signal, report }
        );

        report('Script generation completed, writing files...');
        const workspace = await store.writeArtifact(jobId, artifact);

        transition('executing');
        report('Files written, preparing to execute test...');
        execution = ExecutionResultSchema.parse(await sandbox.execute(workspace));
        report(`Script execution finished with exit code: ${execution.exitCode}`);

        if (execution.kind === 'completed' && execution.exitCode === 0 && execution.stdout.trim().length > 0) {
          transition('validating');
          report('Validating script output...');
          verdict = validateOutput(execution.stdout, objective, {
            minimumCountRatio: configuration.minimumCountRatio
          });
          report(`Validation result: ${verdict.feedback}`);

          if (!verdict.valid) {
            throw new ValidationFailure(verdict.feedback, execution);
          }

          const packaged = await store.packageArtifact(jobId);
          report(`Created downloadable package: ${packaged.filename}`);
          recordAttempt({ index, excerpt, artifact, execution, verdict, failureReason: null });
          report('Success! Script executed and output is valid.');
          return finish('succeeded', {
            status: 'success',
            message: SUCCESS_MESSAGE,
            preview: truncateSample(execution.stdout, PREVIEW_LENGTH),
            downloadReference: downloadReferenceFor(jobId)
          });
        }

        if (MANUAL_SETUP_MARKER.test(execution.stderr)) {
          report('Script requires a browser installation by the user.');
          const packaged = await store.packageArtifact(jobId);
          report(`Created downloadable package: ${packaged.filename}`);
          recordAttempt({ index, excerpt, artifact, execution, verdict, failureReason: null });
          return finish('action-required', {
            status: 'action_required',
            message: ACTION_REQUIRED_MESSAGE,
            downloadReference: downloadReferenceFor(jobId)
          });
        }

        throw new ExecutionError(
          executionPhase(execution),
          executionFailureReason(execution, configuration.timeouts.runMs),
          execution
        );
      } catch (error) {
        if (error instanceof IllegalTransitionError) {
          throw error;
        }

        const failure = describeAttemptFailure(error);
        history.push(
          Object.freeze({
            attempt: index,
            reason: failure.reason,
            generatedArtifact: artifact,
            stdoutSample: truncateSample(failure.stdout, DIAGNOSTIC_SAMPLE_LENGTH),
            stderrSample: truncateSample(failure.stderr, DIAGNOSTIC_SAMPLE_LENGTH),
            excerptUsed: excerpt.text
          })
        );
        recordAttempt({ index, excerpt, artifact, execution, verdict, failureReason: failure.reason });
        report(`Attempt ${index + 1} failed: ${failure.reason}`);
      }
    }

    const exhausted = new BudgetExhausted(configuration.maxAttempts);
    logger.error(exhausted.message, { jobId });
    report('Scraping job failed after all attempts.');
    const last = history.at(-1);
    return finish('failed', {
      status: 'error',
      message: FAILED_JOB_MESSAGE,
      diagnosticDetail: last
        ? `Final attempt failed: ${last.reason}\n\nSTDERR:\n${last.stderrSample}`
        : 'Final attempt failed: Unknown failure\n\nSTDERR:\nNo details available.'
    });
  } catch (error) {
    if (error instanceof IllegalTransitionError) {
      throw error;
    }
    report(`Unexpected error in scraping job: ${describeError(error)}`);
    return finish('failed', {
      status: 'error',
      message: `Unexpected error occurred: ${describeError(error)}`
    });
  }
};
