import { describe, expect, it } from 'vitest';

import { OracleError } from '@scriptforge/core';

import { parseGeneratedArtifact } from './response.js';

const codeOf = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return error instanceof OracleError ? error.code : undefined;
  }
  return undefined;
};

describe('parseGeneratedArtifact', () => {
  it('maps the response fields onto an artifact', () => {
    const artifact = parseGeneratedArtifact(JSON.stringify({ script: 'console.log("[]")', packageJson: '{}' }));

    expect(artifact).toEqual({ scriptText: 'console.log("[]")', dependencyManifestText: '{}' });
  });

  it('tolerates a fenced code block', () => {
    const text = '```json\n{"script": "console.log(1)", "packageJson": ""}\n```';

    expect(parseGeneratedArtifact(text).scriptText).toBe('console.log(1)');
  });

  it('distinguishes empty, malformed and incomplete responses', () => {
    expect(codeOf(() => parseGeneratedArtifact('   '))).toBe('empty-response');
    expect(codeOf(() => parseGeneratedArtifact('here is your script'))).toBe('malformed-response');
    expect(codeOf(() => parseGeneratedArtifact('{"script": "x"}'))).toBe('missing-fields');
    expect(codeOf(() => parseGeneratedArtifact('{"script": " ", "packageJson": "{}"}'))).toBe('missing-fields');
  });
});
