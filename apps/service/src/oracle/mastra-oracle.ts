import { setTimeout as sleep } from 'node:timers/promises';

import { describeError, OracleError, type GeneratedArtifact } from '@scriptforge/core';
import type { JobLogger } from '@scriptforge/core/jobs';

import {
  createOpenAIScriptGeneratorAgent,
  type ScriptGeneratorAgent
} from '../mastra/agents/script-generator-agent.js';
import { buildGenerationPrompt } from './prompt.js';
import { parseGeneratedArtifact } from './response.js';
import type { GenerationContext, GenerationOracle, GenerationRequest } from './types.js';

export type ScriptGeneratorAgentFactory = (credential: string, model: string) => ScriptGeneratorAgent;

export interface MastraGenerationOracleOptions {
  readonly credentials: readonly string[];
  readonly model: string;
  readonly timeoutMs: number;
  readonly credentialRetryDelayMs: number;
  readonly logger: JobLogger;
  readonly createAgent?: ScriptGeneratorAgentFactory;
}

export const maskCredential = (credential: string): string =>
  credential.length > 8 ? `${credential.slice(0, 4)}...${credential.slice(-4)}` : '****';

const withTimeout = async <T>(operation: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new OracleError('timeout', `Model call timed out after ${Math.round(timeoutMs / 1_000)} seconds.`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Generation oracle backed by a Mastra agent. Credentials are tried in order,
 * each with its own agent, until one yields a well-formed artifact.
 */
export class MastraGenerationOracle implements GenerationOracle {
  private readonly credentials: readonly string[];
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly credentialRetryDelayMs: number;
  private readonly logger: JobLogger;
  private readonly createAgent: ScriptGeneratorAgentFactory;

  constructor(options: MastraGenerationOracleOptions) {
    this.credentials = options.credentials;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.credentialRetryDelayMs = options.credentialRetryDelayMs;
    this.logger = options.logger;
    this.createAgent = options.createAgent ?? createOpenAIScriptGeneratorAgent;
  }

  async generate(request: GenerationRequest, context: GenerationContext = {}): Promise<GeneratedArtifact> {
    if (this.credentials.length === 0) {
      throw new OracleError('missing-credentials', 'No API keys provided in settings.');
    }

    const notify = (message: string, args?: Record<string, unknown>) => {
      this.logger.info(message, args);
      context.report?.(message);
    };

    const prompt = buildGenerationPrompt(request);
    notify(`Starting script generation with model: ${this.model}`, { promptLength: prompt.length });

    let lastError: unknown;
    for (const [index, credential] of this.credentials.entries()) {
      if (index > 0 && context.signal?.aborted) {
        break;
      }

      const ordinal = index + 1;
      notify(`Attempting script generation with API key #${ordinal} (${maskCredential(credential)})`);

      try {
        const agent = this.createAgent(credential, this.model);
        const response = await withTimeout(agent.generate(prompt), this.timeoutMs);
        const artifact = parseGeneratedArtifact(response.text);
        notify(`Successfully generated script with API key #${ordinal}`);
        return artifact;
      } catch (error) {
        lastError = error;
        this.logger.warn('Script generation failed for credential', {
          credential: maskCredential(credential),
          error: describeError(error)
        });
        context.report?.(`API key #${ordinal} failed: ${describeError(error)}`);

        if (index < this.credentials.length - 1 && this.credentialRetryDelayMs > 0) {
          await sleep(this.credentialRetryDelayMs);
        }
      }
    }

    throw new OracleError(
      'credentials-exhausted',
      `All available API keys failed. Last error: ${describeError(lastError)}`,
      { cause: lastError }
    );
  }
}
