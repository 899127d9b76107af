import { readFile } from 'node:fs/promises';

import { RuleFileSchema } from './schema.js';
import { ConfigError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { RuleSet } from '../types/index.js';

/**
 * Validate a parsed rule document and compile its patterns.
 *
 * @param document - Parsed JSON of a rule file
 * @param source - Where the document came from, used in error messages
 * @throws ConfigError listing every invalid field
 */
export function parseRuleSet(document: unknown, source = 'rule document'): RuleSet {
  const result = RuleFileSchema.safeParse(document);
  if (!result.success) {
    throw ConfigError.fromIssues(source, result.error.issues);
  }
  return Object.freeze(result.data.rules.map(rule => Object.freeze(rule)));
}

/**
 * Read, parse and validate an EXIF override rule file.
 */
export async function loadRuleSet(filePath: string): Promise<RuleSet> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read EXIF override rules file: "${filePath}"`, {
      cause: error
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`EXIF override rules file is not valid JSON: "${filePath}"`, {
      cause: error
    });
  }

  const ruleSet = parseRuleSet(document, `"${filePath}"`);
  logger.debug({ rulesPath: filePath, ruleCount: ruleSet.length }, 'EXIF override rules loaded');
  return ruleSet;
}
