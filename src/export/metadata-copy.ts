/**
 * Copying EXIF from camera originals to exports
 *
 * An export of `1_EDIT/20240501_1032_1234-BW.tif` takes its metadata from the
 * out-of-camera JPEG `0_RAW/20240501_1032_1234.jpg` when there is one, and
 * otherwise from the first `20240501_1032_1234*.*` in 0_RAW or, failing
 * that, in the project directory.
 */

import type { Dirent } from 'node:fs';
import { join } from 'node:path';

import { listFiles } from '../library/index.js';
import { MetadataReadError } from '../lib/errors.js';
import { EXPORT_TAGS, type MetadataStore } from '../metadata/index.js';
import { applyMutations, evaluate, referencedTags } from '../rules/index.js';
import type { MetadataSnapshot, MetadataTag, ProjectLocations, RuleSet } from '../types/index.js';

export const OOC_EXTENSION = '.jpg';
export const EXPORT_EXTENSION = '.jpg';

const ENHANCED_SUFFIX = '-Enhanced-NR';
const BLACK_AND_WHITE_SUFFIX = '-BW';

function stripSuffix(value: string, suffix: string): string {
  return value.endsWith(suffix) ? value.slice(0, value.length - suffix.length) : value;
}

/**
 * Export file stem for an edit: `x-Enhanced-NR` becomes `x`, `x-BW` stays.
 */
export function exportTargetName(editStem: string): string {
  return stripSuffix(editStem, ENHANCED_SUFFIX);
}

/**
 * Stem of the camera original an edit was made from.
 */
export function metadataSourceStem(editStem: string): string {
  return stripSuffix(stripSuffix(editStem, ENHANCED_SUFFIX), BLACK_AND_WHITE_SUFFIX);
}

async function firstMatching(dir: string, stem: string): Promise<string | null> {
  let files: Dirent[];
  try {
    files = await listFiles(dir);
  } catch {
    return null;
  }
  const match = files.find(
    file => file.name.startsWith(stem) && file.name.indexOf('.', stem.length) !== -1
  );
  return match ? join(dir, match.name) : null;
}

/**
 * Camera original to copy an edit's metadata from.
 *
 * @throws MetadataReadError when no candidate exists
 */
export async function findMetadataSource(
  locations: ProjectLocations,
  editStem: string
): Promise<string> {
  const stem = metadataSourceStem(editStem);

  const ooc = (await listFiles(locations.rawDir)).find(
    file => file.name === `${stem}${OOC_EXTENSION}`
  );
  if (ooc) {
    return join(locations.rawDir, ooc.name);
  }

  const candidate =
    (await firstMatching(locations.rawDir, stem)) ??
    (await firstMatching(locations.projectDir, stem));
  if (!candidate) {
    throw new MetadataReadError(
      join(locations.rawDir, `${stem}*.*`),
      'No files found to copy metadata from'
    );
  }
  return candidate;
}

/**
 * Read what an export needs from its original: the exported tags plus every
 * tag a rule pattern looks at.
 */
export async function readSourceMetadata(
  sourceFile: string,
  ruleSet: RuleSet,
  store: MetadataStore
): Promise<MetadataSnapshot> {
  const names = [...new Set<string>([...EXPORT_TAGS, ...referencedTags(ruleSet)])];
  return store.read(sourceFile, names);
}

export interface ExportTags {
  tags: MetadataTag[];
  overrides: MetadataTag[];
}

/**
 * Tags to write into an export: the original's exported tags with rule
 * overrides applied on top.
 */
export function buildExportTags(snapshot: MetadataSnapshot, ruleSet: RuleSet): ExportTags {
  const exported: Record<string, string> = {};
  for (const name of EXPORT_TAGS) {
    const value = snapshot[name];
    if (value !== undefined) {
      exported[name] = value;
    }
  }

  const overrides = evaluate(snapshot, ruleSet);
  return { tags: [...applyMutations(exported, overrides).values()], overrides };
}
