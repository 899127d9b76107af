/**
 * EXIF override rules: loading, validation and evaluation.
 */

export { parseRuleSet, loadRuleSet } from './loader.js';
export { evaluate, applyMutations, ruleMatches, referencedTags } from './engine.js';
export { RuleFileSchema, type RuleFileInput } from './schema.js';
