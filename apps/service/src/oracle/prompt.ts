import type { FailureRecord } from '@scriptforge/core/jobs';

import type { GenerationRequest } from './types.js';

export const SCRIPT_GENERATOR_INSTRUCTIONS = [
  'You are a senior Node.js web scraping engineer inside an automated agent.',
  'Generate a complete, runnable ES module scraper and the package.json that installs its dependencies.',
  '',
  'Inputs:',
  '- TARGET_URL: the live page the script must request. Always fetch it fresh; never embed the snapshot.',
  '- USER_REQUEST: what data to extract.',
  '- HTML_STRUCTURE_MAP (optional): an indented tag outline of the whole page.',
  '- HTML_SNAPSHOT: a sample of the page markup to derive selectors from.',
  '- CONVERSATION_HISTORY (optional): earlier failed attempts. Fixing those failures is the top priority.',
  '',
  'Rules:',
  '- The script runs as `node scraper.mjs` on Node.js 20 after `npm install` in its directory.',
  '- Print the extracted data to stdout as a single JSON string, normally an array of objects. Print nothing else to stdout.',
  '- Print `[]` when nothing is found. Write diagnostics to stderr.',
  '- Prefer static scraping with the built-in fetch and cheerio. Use playwright only when history shows the page renders client side.',
  '- Send realistic browser headers (User-Agent, Accept, Accept-Language) and wait a random interval between requests.',
  '- Wrap network calls and parsing in try/catch so unexpected markup does not crash the script.',
  '- package.json must declare "type": "module" and every dependency the script imports.',
  '',
  'When history is present, first identify the root cause of the last failure from its reason, STDOUT and STDERR, then change selectors, strategy or logic accordingly. Do not repeat a failed approach.',
  '',
  'Answer with one JSON object and nothing else: {"script": "<contents of scraper.mjs>", "packageJson": "<contents of package.json>"}'
].join('\n');

const renderFailure = (record: FailureRecord, index: number): string => {
  const ordinal = index + 1;
  return [
    `<ATTEMPT_${ordinal}_FAILED>`,
    `REASON_FOR_FAILURE: ${record.reason}`,
    'FAILED_CODE:',
    '```js',
    record.generatedArtifact?.scriptText ?? 'Code not generated',
    '```',
    'STDOUT:',
    '```',
    record.stdoutSample,
    '```',
    'STDERR:',
    '```',
    record.stderrSample,
    '```',
    `</ATTEMPT_${ordinal}_FAILED>`
  ].join('\n');
};

export const renderFailureHistory = (history: readonly FailureRecord[]): string =>
  ['<CONVERSATION_HISTORY>', ...history.map(renderFailure), '</CONVERSATION_HISTORY>'].join('\n');

export const buildGenerationPrompt = (request: GenerationRequest): string => {
  const sections = [`TARGET_URL: ${request.url}`, `USER_REQUEST: ${request.objective}`];

  if (request.structuralOutline) {
    sections.push(`HTML_STRUCTURE_MAP:\n${request.structuralOutline}`);
  }

  sections.push(`HTML_SNAPSHOT:\n${request.excerpt}`);

  if (request.failureHistory.length > 0) {
    sections.push(renderFailureHistory(request.failureHistory));
    sections.push(
      'Analyze the conversation history and generate an improved version that addresses every issue it shows.'
    );
  }

  return sections.join('\n\n');
};
