import type {
  ExecutionResult,
  GeneratedArtifact,
  JobResult,
  ValidationVerdict
} from '../schemas.js';

export type JobState =
  | 'fetching'
  | 'reducing'
  | 'generating'
  | 'executing'
  | 'validating'
  | 'succeeded'
  | 'action-required'
  | 'failed';

export type TerminalJobState = Extract<JobState, 'succeeded' | 'action-required' | 'failed'>;

export const JOB_STATE_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  fetching: ['reducing', 'failed'],
  reducing: ['generating', 'failed'],
  generating: ['executing', 'failed'],
  executing: ['validating', 'generating', 'action-required', 'failed'],
  validating: ['succeeded', 'generating', 'failed'],
  succeeded: [],
  'action-required': [],
  failed: []
};

export const isTerminalJobState = (state: JobState): state is TerminalJobState =>
  JOB_STATE_TRANSITIONS[state].length === 0;

export class IllegalTransitionError extends Error {
  readonly from: JobState;
  readonly to: JobState;

  constructor(from: JobState, to: JobState) {
    super(`Illegal job state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
    this.from = from;
    this.to = to;
  }
}

export const assertTransition = (from: JobState, to: JobState): void => {
  if (!JOB_STATE_TRANSITIONS[from].includes(to)) {
    throw new IllegalTransitionError(from, to);
  }
};

export type ExcerptProvenance = 'reduction' | 'expansion';

export interface Excerpt {
  readonly text: string;
  readonly provenance: ExcerptProvenance;
}

/**
 * A failed attempt as shown to the generation oracle. Samples are truncated;
 * `generatedArtifact` is null when generation itself failed.
 */
export interface FailureRecord {
  readonly attempt: number;
  readonly reason: string;
  readonly generatedArtifact: GeneratedArtifact | null;
  readonly stdoutSample: string;
  readonly stderrSample: string;
  readonly excerptUsed: string;
}

export interface AttemptRecord {
  readonly index: number;
  readonly excerpt: Excerpt;
  readonly artifact: GeneratedArtifact | null;
  readonly execution: ExecutionResult | null;
  readonly verdict: ValidationVerdict | null;
  readonly failureReason: string | null;
}

export interface JobLogger {
  debug(message: string, args?: Record<string, unknown>): void;
  info(message: string, args?: Record<string, unknown>): void;
  warn(message: string, args?: Record<string, unknown>): void;
  error(message: string, args?: Record<string, unknown>): void;
}

export type ProgressObserver = (line: string) => void;

export interface JobOutcome {
  readonly jobId: string;
  readonly state: TerminalJobState;
  readonly result: JobResult;
  readonly attempts: readonly AttemptRecord[];
}

export interface JobLogEvent {
  readonly log: string;
}

export type JobStreamEvent = JobLogEvent | JobResult;

export const isJobLogEvent = (event: JobStreamEvent): event is JobLogEvent => 'log' in event;
