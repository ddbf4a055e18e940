import type { GeneratedArtifact } from '@scriptforge/core';
import type { FailureRecord, ProgressObserver } from '@scriptforge/core/jobs';

export interface GenerationRequest {
  readonly objective: string;
  readonly url: string;
  readonly excerpt: string;
  /** Only sent on the first attempt. */
  readonly structuralOutline?: string;
  readonly failureHistory: readonly FailureRecord[];
}

export interface GenerationContext {
  readonly signal?: AbortSignal;
  readonly report?: ProgressObserver;
}

export interface GenerationOracle {
  generate(request: GenerationRequest, context?: GenerationContext): Promise<GeneratedArtifact>;
}
