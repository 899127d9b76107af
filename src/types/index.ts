// Core type definitions for the photo library tools

/**
 * Value types understood by the metadata writer, named after Exiv2's type names.
 */
export const VALUE_TYPES = [
  'Byte',
  'Ascii',
  'Short',
  'Long',
  'Rational',
  'SByte',
  'Undefined',
  'SShort',
  'SLong',
  'SRational',
  'Float',
  'Double',
  'Comment',
  'Date',
  'Time',
  'XmpText'
] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export const DEFAULT_VALUE_TYPE: ValueType = 'Ascii';

/**
 * A single metadata tag keyed by its Exiv2-style name, e.g. `Exif.Photo.LensModel`.
 */
export interface MetadataTag {
  name: string;
  value: string;
  valueType: ValueType;
}

/**
 * Current metadata of a photo: tag name to its recorded value.
 * Tags the camera did not record are absent.
 */
export type MetadataSnapshot = Readonly<Record<string, string>>;

export interface TagPattern {
  tag: string;
  valueRegex: string;
}

export interface CompiledPattern extends TagPattern {
  regex: RegExp;
}

export interface OverrideRule {
  /** Absent for unconditional rules */
  pattern?: CompiledPattern;
  tags: readonly MetadataTag[];
}

export type RuleSet = readonly OverrideRule[];

export type ExportSize = 'large' | 'medium' | 'small';

export interface ProjectLocations {
  projectDir: string;
  rawDir: string;
  editDir: string;
  exportDir: string;
}

/**
 * Outcome of one file in a batch command.
 */
export type FileOutcome =
  | { status: 'done'; file: string; target: string }
  | { status: 'unchanged'; file: string }
  | { status: 'skipped'; file: string; reason: string }
  | { status: 'failed'; file: string; reason: string };

export interface BatchSummary {
  outcomes: FileOutcome[];
  done: number;
  unchanged: number;
  skipped: number;
  failed: number;
}
