import { z } from 'zod';

import { GeneratedArtifactSchema, OracleError, type GeneratedArtifact } from '@scriptforge/core';

const FENCED_BLOCK = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

const GenerationPayloadSchema = z.object({
  script: z.string(),
  packageJson: z.string()
});

/** Field names the model is asked to answer with. */
export const RESPONSE_FIELDS = ['script', 'packageJson'] as const;

const stripFence = (text: string): string => {
  const trimmed = text.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
};

export const parseGeneratedArtifact = (text: string): GeneratedArtifact => {
  const body = stripFence(text);
  if (body.length === 0) {
    throw new OracleError('empty-response', 'Received an empty response from the model.');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new OracleError('malformed-response', 'Model response was not valid JSON.', { cause: error });
  }

  const fields = GenerationPayloadSchema.safeParse(payload);
  if (!fields.success) {
    throw new OracleError(
      'missing-fields',
      `Invalid response structure: missing required keys (${RESPONSE_FIELDS.join(', ')}).`,
      { cause: fields.error }
    );
  }

  const artifact = GeneratedArtifactSchema.safeParse({
    scriptText: fields.data.script,
    dependencyManifestText: fields.data.packageJson
  });
  if (!artifact.success) {
    throw new OracleError('missing-fields', 'Model response contained an empty script.', { cause: artifact.error });
  }
  return artifact.data;
};
