/**
 * RAW file renaming
 *
 * Camera files in 0_RAW are renamed to `YYYYMMDD_hhmm_nnnn.<ext>`: capture
 * date and time (seconds dropped) from Exif.Photo.DateTimeOriginal, followed
 * by the last four characters of the camera's file name, which cameras use
 * for the frame number. Extensions are lowercased.
 *
 *   DSC_1234.NEF -> 20240501_1032_1234.nef
 */

import { access, rename } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { listFiles, resolveProjectLocations } from '../library/index.js';
import { describeError, isFatal, ApplicationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { summarize } from '../lib/summary.js';
import { createExifToolStore, DATE_TIME_ORIGINAL, type MetadataStore } from '../metadata/index.js';
import type { BatchSummary, FileOutcome } from '../types/index.js';

export interface CaptureTimestamp {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
}

const EXIF_DATE_TIME = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?/;

/**
 * Parse an EXIF `YYYY:MM:DD hh:mm:ss` value. Sub-seconds and zone offsets are ignored.
 */
export function parseCaptureTimestamp(value: string): CaptureTimestamp | null {
  const match = EXIF_DATE_TIME.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute] = match;
  if (!year || !month || !day || !hour || !minute) {
    return null;
  }
  // cameras without a set clock write 0000:00:00 00:00:00
  if (year === '0000' || month === '00' || day === '00') {
    return null;
  }
  return { year, month, day, hour, minute };
}

/**
 * Frame number assigned by the camera: the last four characters of the file stem.
 */
export function cameraNumber(stem: string): string | null {
  const number = stem.slice(-4);
  return number.length > 0 ? number : null;
}

export function buildTargetName(timestamp: CaptureTimestamp, frame: string, ext: string): string {
  const { year, month, day, hour, minute } = timestamp;
  return `${year}${month}${day}_${hour}${minute}_${frame}${ext.toLowerCase()}`;
}

export type RenamePlanEntry =
  | { action: 'rename'; source: string; target: string }
  | { action: 'unchanged'; source: string }
  | { action: 'skip'; source: string; reason: string };

/**
 * Work out the new name of every file in a 0_RAW directory without touching
 * anything.
 *
 * @throws ApplicationError when the directory holds no files
 */
export async function planRenames(rawDir: string, store: MetadataStore): Promise<RenamePlanEntry[]> {
  const files = await listFiles(rawDir);
  if (files.length === 0) {
    throw new ApplicationError(`No files found in "${rawDir}"`);
  }

  const existing = new Set(files.map(file => file.name));
  const claimed = new Map<string, string>();
  const plan: RenamePlanEntry[] = [];

  for (const file of files) {
    const source = file.name;
    const ext = extname(source);
    const stem = source.slice(0, source.length - ext.length);

    const frame = cameraNumber(stem);
    if (!frame) {
      plan.push({ action: 'skip', source, reason: 'Could not extract camera number' });
      continue;
    }

    let metadata: Record<string, string>;
    try {
      metadata = await store.read(join(rawDir, source), [DATE_TIME_ORIGINAL]);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      plan.push({ action: 'skip', source, reason: describeError(error) });
      continue;
    }

    const captured = metadata[DATE_TIME_ORIGINAL];
    const timestamp = captured === undefined ? null : parseCaptureTimestamp(captured);
    if (!timestamp) {
      plan.push({ action: 'skip', source, reason: 'Could not extract EXIF timestamp' });
      continue;
    }

    const target = buildTargetName(timestamp, frame, ext);
    const claimedBy = claimed.get(target);
    if (claimedBy !== undefined) {
      plan.push({ action: 'skip', source, reason: `${target} is also the new name of ${claimedBy}` });
      continue;
    }
    claimed.set(target, source);

    if (target === source) {
      plan.push({ action: 'unchanged', source });
    } else if (existing.has(target)) {
      plan.push({ action: 'skip', source, reason: `${target} already exists` });
    } else {
      plan.push({ action: 'rename', source, target });
    }
  }

  return plan;
}

export interface RenameOptions {
  dryRun?: boolean;
  store?: MetadataStore;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rename every camera file in a project's 0_RAW directory.
 */
export async function renameRawFiles(
  projectDir: string,
  options: RenameOptions = {}
): Promise<BatchSummary> {
  const { dryRun = false, store = createExifToolStore() } = options;
  const { rawDir } = await resolveProjectLocations(projectDir, { requireRaw: true });

  logger.info({ rawDir, dryRun }, 'Renaming raw files');

  const plan = await planRenames(rawDir, store);
  const outcomes: FileOutcome[] = [];

  for (const entry of plan) {
    if (entry.action === 'unchanged') {
      outcomes.push({ status: 'unchanged', file: entry.source });
      continue;
    }
    if (entry.action === 'skip') {
      logger.warn({ file: entry.source, reason: entry.reason }, 'Skipping file');
      outcomes.push({ status: 'skipped', file: entry.source, reason: entry.reason });
      continue;
    }

    const from = join(rawDir, entry.source);
    const to = join(rawDir, entry.target);
    if (dryRun) {
      logger.info({ from: entry.source, to: entry.target }, 'Would rename');
      outcomes.push({ status: 'done', file: entry.source, target: entry.target });
      continue;
    }

    try {
      // rename() replaces an existing target silently
      if (await exists(to)) {
        throw new Error(`${entry.target} appeared while renaming`);
      }
      await rename(from, to);
      logger.info({ from: entry.source, to: entry.target }, 'Renamed');
      outcomes.push({ status: 'done', file: entry.source, target: entry.target });
    } catch (error) {
      logger.error({ file: entry.source, error: describeError(error) }, 'Rename failed');
      outcomes.push({ status: 'failed', file: entry.source, reason: describeError(error) });
    }
  }

  const summary = summarize(outcomes);
  logger.info(
    {
      renamed: summary.done,
      unchanged: summary.unchanged,
      skipped: summary.skipped,
      failed: summary.failed
    },
    'Done'
  );
  return summary;
}
