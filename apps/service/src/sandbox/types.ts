import type { ExecutionResult } from '@scriptforge/core';

export interface ExecutionSandbox {
  /** Installs dependencies and runs the script in `workingDirectory`. Never throws for script failures. */
  execute(workingDirectory: string): Promise<ExecutionResult>;
}
