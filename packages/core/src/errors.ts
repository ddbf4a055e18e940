import type { ExecutionResult } from './schemas.js';

export class ScriptforgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source document could not be retrieved. Ends the job. */
export class TransportError extends ScriptforgeError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export type OracleErrorCode =
  | 'missing-credentials'
  | 'credentials-exhausted'
  | 'empty-response'
  | 'malformed-response'
  | 'missing-fields'
  | 'timeout';

export class OracleError extends ScriptforgeError {
  readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

export type ExecutionPhase = 'install' | 'run' | 'timeout';

export class ExecutionError extends ScriptforgeError {
  readonly phase: ExecutionPhase;
  readonly execution: ExecutionResult;

  constructor(phase: ExecutionPhase, message: string, execution: ExecutionResult) {
    super(message);
    this.phase = phase;
    this.execution = execution;
  }
}

export class ValidationFailure extends ScriptforgeError {
  readonly feedback: string;
  readonly execution: ExecutionResult;

  constructor(feedback: string, execution: ExecutionResult) {
    super(feedback);
    this.feedback = feedback;
    this.execution = execution;
  }
}

export class BudgetExhausted extends ScriptforgeError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Attempt budget of ${attempts} exhausted without a valid extractor.`);
    this.attempts = attempts;
  }
}

/** Kinds that are recorded in the failure history instead of ending the job. */
export const isRetryableError = (
  error: unknown
): error is OracleError | ExecutionError | ValidationFailure =>
  error instanceof OracleError || error instanceof ExecutionError || error instanceof ValidationFailure;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
