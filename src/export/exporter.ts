/**
 * Export pipeline
 *
 * For every `1_EDIT/*.tif` of a project:
 * 1. find the camera original and read its metadata
 * 2. render the resized, bordered JPEG into 2_EXPORT
 * 3. write the original's tags, with EXIF override rules applied, into the JPEG
 *
 * Rules are loaded and validated before the first file. A file whose original
 * cannot be read is skipped; a file that fails to render or to take its
 * metadata is counted as failed. Neither stops the batch.
 */

import { extname, join } from 'node:path';

import {
  EXPORT_EXTENSION,
  buildExportTags,
  exportTargetName,
  findMetadataSource,
  readSourceMetadata,
  type ExportTags
} from './metadata-copy.js';
import { getResizeOptions, renderExport } from './resize.js';
import { listFiles, resolveProjectLocations } from '../library/index.js';
import { ApplicationError, describeError, isFatal } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { pluralize, summarize } from '../lib/summary.js';
import { createExifToolStore, type MetadataStore } from '../metadata/index.js';
import { loadRuleSet } from '../rules/index.js';
import type { BatchSummary, ExportSize, FileOutcome, RuleSet } from '../types/index.js';

const EDIT_EXTENSIONS = new Set(['.tif', '.tiff']);

export interface ExportOptions {
  size?: ExportSize | string;
  border?: boolean;
  /** EXIF override rules file */
  rulesPath?: string;
  dryRun?: boolean;
  store?: MetadataStore;
}

/**
 * Stems of the edits in 1_EDIT, sorted.
 *
 * @throws ApplicationError when there are none
 */
export async function listEdits(editDir: string): Promise<{ stem: string; file: string }[]> {
  const edits = (await listFiles(editDir))
    .filter(file => EDIT_EXTENSIONS.has(extname(file.name).toLowerCase()))
    .map(file => ({
      stem: file.name.slice(0, file.name.length - extname(file.name).length),
      file: join(editDir, file.name)
    }));

  if (edits.length === 0) {
    throw new ApplicationError(`No "*.tif" files found in "${editDir}"`);
  }
  return edits;
}

export async function processForExport(
  projectDir: string,
  options: ExportOptions = {}
): Promise<BatchSummary> {
  const { size = 'large', border = true, rulesPath, dryRun = false } = options;

  const resizeOptions = getResizeOptions(size, border);
  const ruleSet: RuleSet = rulesPath ? await loadRuleSet(rulesPath) : [];
  const locations = await resolveProjectLocations(projectDir, {
    requireRaw: true,
    requireEdit: true,
    createExport: !dryRun
  });
  const store = options.store ?? createExifToolStore();

  logger.info(
    {
      project: locations.projectDir,
      size: `${resizeOptions.width}x${resizeOptions.height}`,
      border: resizeOptions.border !== null,
      exifOverrides: rulesPath ?? null,
      rules: ruleSet.length,
      dryRun
    },
    'Exporting edits'
  );

  const edits = await listEdits(locations.editDir);
  const outcomes: FileOutcome[] = [];

  for (const edit of edits) {
    const targetName = `${exportTargetName(edit.stem)}${EXPORT_EXTENSION}`;
    const target = join(locations.exportDir, targetName);

    let tags: ExportTags;
    try {
      const source = await findMetadataSource(locations, edit.stem);
      const snapshot = await readSourceMetadata(source, ruleSet, store);
      tags = buildExportTags(snapshot, ruleSet);
      logger.debug(
        { edit: edit.stem, source, tags: tags.tags.length, overrides: tags.overrides.length },
        'Metadata source read'
      );
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      logger.warn({ edit: edit.stem, error: describeError(error) }, 'Skipping edit');
      outcomes.push({ status: 'skipped', file: edit.stem, reason: describeError(error) });
      continue;
    }

    if (dryRun) {
      logger.info({ edit: edit.stem, target: targetName }, 'Would export');
      outcomes.push({ status: 'done', file: edit.stem, target: targetName });
      continue;
    }

    try {
      const rendered = await renderExport(edit.file, target, resizeOptions);
      await store.write(target, tags.tags);
      logger.info(
        { edit: edit.stem, target: targetName, width: rendered.width, height: rendered.height },
        'Exported'
      );
      outcomes.push({ status: 'done', file: edit.stem, target: targetName });
    } catch (error) {
      logger.error({ edit: edit.stem, error: describeError(error) }, 'Export failed');
      outcomes.push({ status: 'failed', file: edit.stem, reason: describeError(error) });
    }
  }

  const summary = summarize(outcomes);
  logger.info(
    { exported: summary.done, skipped: summary.skipped, failed: summary.failed },
    `Done (${edits.length} ${pluralize('file', edits.length)})`
  );
  return summary;
}
