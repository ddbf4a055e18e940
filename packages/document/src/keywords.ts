import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const KEYWORD_TABLE_PATH = resolve(__dirname, '../data/structural-keywords.json');

const KeywordTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

export type StructuralKeywordTable = ReadonlyMap<string, readonly string[]>;

let cachedTable: StructuralKeywordTable | undefined;

export const loadStructuralKeywords = (): StructuralKeywordTable => {
  if (cachedTable) {
    return cachedTable;
  }
  const parsed = KeywordTableSchema.parse(JSON.parse(readFileSync(KEYWORD_TABLE_PATH, 'utf-8')));
  cachedTable = new Map(Object.entries(parsed));
  return cachedTable;
};

export const tokenizeObjective = (objective: string): ReadonlySet<string> =>
  new Set(
    objective
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((word) => word.length > 0)
  );

/**
 * Selectors activated by the objective's words, in keyword-table order with
 * duplicates removed.
 */
export const selectorsForObjective = (
  objective: string,
  table: StructuralKeywordTable = loadStructuralKeywords()
): readonly string[] => {
  const words = tokenizeObjective(objective);
  const selectors = new Set<string>();
  for (const [keyword, keywordSelectors] of table) {
    if (!words.has(keyword)) {
      continue;
    }
    for (const selector of keywordSelectors) {
      selectors.add(selector);
    }
  }
  return [...selectors];
};
