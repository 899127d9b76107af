/**
 * zod schemas for the EXIF override rule file.
 *
 * Besides the documented snake_case keys the schema accepts the spellings
 * found in older rule files: `tag` for a tag's name, `value` for a pattern's
 * regular expression, and camelCase `valueType` / `valueRegex`.
 */

import { z } from 'zod';

import { DEFAULT_VALUE_TYPE, VALUE_TYPES } from '../types/index.js';
import type { CompiledPattern, MetadataTag, OverrideRule } from '../types/index.js';

export const ValueTypeSchema = z.enum(VALUE_TYPES);

const TagValueSchema = z.union([z.string(), z.number()]).transform(value => String(value));

export const TagEntrySchema = z
  .object({
    name: z.string().min(1).optional(),
    tag: z.string().min(1).optional(),
    value: TagValueSchema,
    value_type: ValueTypeSchema.optional(),
    valueType: ValueTypeSchema.optional()
  })
  .transform((entry, ctx): MetadataTag => {
    const name = entry.name ?? entry.tag;
    if (name === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Tag name is required',
        path: ['name']
      });
      return z.NEVER;
    }
    return {
      name,
      value: entry.value,
      valueType: entry.value_type ?? entry.valueType ?? DEFAULT_VALUE_TYPE
    };
  });

export const PatternSchema = z
  .object({
    tag: z.string().min(1),
    value_regex: z.string().optional(),
    valueRegex: z.string().optional(),
    value: z.string().optional()
  })
  .transform((pattern, ctx): CompiledPattern => {
    const source = pattern.value_regex ?? pattern.valueRegex ?? pattern.value;
    if (source === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Pattern regular expression is required',
        path: ['value_regex']
      });
      return z.NEVER;
    }
    try {
      return { tag: pattern.tag, valueRegex: source, regex: new RegExp(source) };
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof SyntaxError ? error.message : 'Invalid regular expression',
        path: ['value_regex']
      });
      return z.NEVER;
    }
  });

export const RuleSchema = z
  .object({
    pattern: PatternSchema.optional(),
    tags: z.array(TagEntrySchema)
  })
  .transform(({ pattern, tags }): OverrideRule => (pattern ? { pattern, tags } : { tags }));

export const RuleFileSchema = z.object({
  rules: z.array(RuleSchema)
});

export type RuleFileInput = z.input<typeof RuleFileSchema>;
