import type { MetadataSnapshot, MetadataTag, OverrideRule, RuleSet } from '../types/index.js';
import { DEFAULT_VALUE_TYPE } from '../types/index.js';

/**
 * Whether a rule applies to a photo. A pattern on a tag the photo does not
 * carry is a non-match.
 */
export function ruleMatches(metadata: MetadataSnapshot, rule: OverrideRule): boolean {
  if (!rule.pattern) {
    return true;
  }
  const value = Object.hasOwn(metadata, rule.pattern.tag) ? metadata[rule.pattern.tag] : undefined;
  return value !== undefined && rule.pattern.regex.test(value);
}

/**
 * Names of the tags the rule set's patterns look at.
 */
export function referencedTags(ruleSet: RuleSet): string[] {
  const names = ruleSet.flatMap(rule => (rule.pattern ? [rule.pattern.tag] : []));
  return [...new Set(names)];
}

/**
 * Compute the tag mutations a rule set produces for one photo.
 *
 * Every pattern is matched against `metadata` as given; tags emitted by an
 * earlier rule are never visible to a later rule's pattern. Mutations come out
 * in rule order, then tag order within a rule.
 */
export function evaluate(metadata: MetadataSnapshot, ruleSet: RuleSet): MetadataTag[] {
  return ruleSet
    .filter(rule => ruleMatches(metadata, rule))
    .flatMap(rule => rule.tags.map(tag => ({ ...tag })));
}

/**
 * Fold mutations over a metadata snapshot. Later mutations of the same tag win.
 * Tags that no mutation touches are kept as Ascii values.
 */
export function applyMutations(
  metadata: MetadataSnapshot,
  mutations: readonly MetadataTag[]
): Map<string, MetadataTag> {
  const result = new Map<string, MetadataTag>();
  for (const [name, value] of Object.entries(metadata)) {
    result.set(name, { name, value, valueType: DEFAULT_VALUE_TYPE });
  }
  for (const mutation of mutations) {
    // delete first so the tag moves to its write position
    result.delete(mutation.name);
    result.set(mutation.name, mutation);
  }
  return result;
}
