import { createOpenAI } from '@ai-sdk/openai';
import { Agent, type MastraLanguageModel } from '@mastra/core/agent';

import { SCRIPT_GENERATOR_INSTRUCTIONS } from '../../oracle/prompt.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4.1-mini';

export interface ScriptGeneratorAgentOptions {
  readonly model: MastraLanguageModel;
}

export const createScriptGeneratorAgent = (options: ScriptGeneratorAgentOptions) =>
  new Agent({
    name: 'scriptGeneratorAgent',
    instructions: SCRIPT_GENERATOR_INSTRUCTIONS,
    model: options.model
  });

export type ScriptGeneratorAgent = ReturnType<typeof createScriptGeneratorAgent>;

/** One provider per credential; keys are never shared between agents. */
export const createOpenAIModel = (apiKey: string, modelName: string): MastraLanguageModel =>
  createOpenAI({ apiKey })(modelName);

export const createOpenAIScriptGeneratorAgent = (apiKey: string, modelName: string): ScriptGeneratorAgent =>
  createScriptGeneratorAgent({ model: createOpenAIModel(apiKey, modelName) });
