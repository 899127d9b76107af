/**
 * Library cleanup
 *
 * Reclaims disk space across every project of a library:
 * - removes `._*` AppleDouble files left behind by macOS on foreign filesystems
 * - empties 1_EDIT (edits can always be exported again from the editor)
 * - replaces RAW selects in the project directory with hard links to the
 *   identical file in 0_RAW
 *
 * With `dryRun` every action is reported and nothing is changed.
 */

import type { Dirent } from 'node:fs';
import { link, lstat, readdir, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { compareContents, isSameFile } from '../hash/index.js';
import { EDIT_DIR, RAW_DIR, findProjects, listFiles } from '../library/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export type CleanupAction =
  | { kind: 'remove-file'; path: string; bytes: number }
  | { kind: 'remove-dir'; path: string; bytes: number }
  | { kind: 'hardlink'; path: string; target: string; bytes: number }
  | { kind: 'mismatch'; path: string; target: string; digest: string; targetDigest: string }
  | { kind: 'error'; path: string; message: string };

export interface CleanupOptions {
  removeDotFiles?: boolean;
  removeEdits?: boolean;
  hardlinkSelects?: boolean;
  dryRun?: boolean;
}

export interface ProjectCleanup {
  projectDir: string;
  actions: CleanupAction[];
}

export interface CleanupTotals {
  filesRemoved: number;
  directoriesRemoved: number;
  linksCreated: number;
  mismatches: number;
  errors: number;
  bytesReclaimed: number;
}

export interface CleanupReport {
  libraryDir: string;
  dryRun: boolean;
  hardlinksSupported: boolean;
  projects: ProjectCleanup[];
  totals: CleanupTotals;
}

const DOT_FILE_PREFIX = '._';
const PROBE_FILE = '.hardlink-probe.dat';

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch {
    return [];
  }
}

async function fileSize(path: string): Promise<number> {
  return (await lstat(path)).size;
}

/**
 * Remove one file or directory, turning a failure into an `error` action so
 * the rest of the library is still cleaned.
 */
async function removeEntry(
  path: string,
  kind: 'remove-file' | 'remove-dir',
  dryRun: boolean,
  remove: () => Promise<void>
): Promise<CleanupAction> {
  try {
    const bytes = kind === 'remove-dir' ? await treeSize(path) : await fileSize(path);
    logger.info({ path, dryRun }, kind === 'remove-dir' ? 'Removing directory' : 'Removing file');
    if (!dryRun) {
      await remove();
    }
    return { kind, path, bytes };
  } catch (error) {
    logger.error({ path, error: describeError(error) }, 'Removing failed');
    return { kind: 'error', path, message: describeError(error) };
  }
}

/**
 * Remove `._*` files anywhere below a project directory.
 */
export async function removeDotFiles(
  projectDir: string,
  dryRun: boolean
): Promise<CleanupAction[]> {
  const actions: CleanupAction[] = [];

  const walk = async (dir: string): Promise<void> => {
    for (const entry of await readEntries(dir)) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else if (entry.isFile() && entry.name.startsWith(DOT_FILE_PREFIX)) {
        actions.push(await removeEntry(path, 'remove-file', dryRun, () => unlink(path)));
      }
    }
  };
  await walk(projectDir);

  return actions;
}

async function treeSize(path: string): Promise<number> {
  const stats = await lstat(path);
  if (!stats.isDirectory()) {
    return stats.size;
  }
  let total = 0;
  for (const entry of await readEntries(path)) {
    total += await treeSize(join(path, entry.name));
  }
  return total;
}

/**
 * Remove everything inside a project's 1_EDIT directory. The directory stays.
 */
export async function removeEditFiles(
  projectDir: string,
  dryRun: boolean
): Promise<CleanupAction[]> {
  const editDir = join(projectDir, EDIT_DIR);
  const actions: CleanupAction[] = [];

  for (const entry of await readEntries(editDir)) {
    const path = join(editDir, entry.name);
    if (entry.isDirectory()) {
      actions.push(
        await removeEntry(path, 'remove-dir', dryRun, () =>
          rm(path, { recursive: true, force: true })
        )
      );
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      actions.push(await removeEntry(path, 'remove-file', dryRun, () => unlink(path)));
    }
  }

  return actions;
}

/**
 * Probe whether the filesystem holding `dir` supports hard links.
 */
export async function areHardLinksSupported(dir: string): Promise<boolean> {
  const probe = join(dir, PROBE_FILE);
  const probeLink = `${probe}.link`;
  try {
    await writeFile(probe, 'TEST');
    await link(probe, probeLink);
    return true;
  } catch (error) {
    logger.debug({ dir, error: describeError(error) }, 'Hard link probe failed');
    return false;
  } finally {
    await rm(probeLink, { force: true });
    await rm(probe, { force: true });
  }
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Replace RAW selects in the project directory with hard links to their
 * identical originals in 0_RAW. Selects whose content differs are reported
 * and left alone.
 */
export async function hardlinkSelects(
  projectDir: string,
  dryRun: boolean
): Promise<CleanupAction[]> {
  const rawDir = join(projectDir, RAW_DIR);
  const actions: CleanupAction[] = [];
  if ((await readEntries(rawDir)).length === 0) {
    return actions;
  }

  // listFiles skips dot files; Dirent.isFile() is false for symlinks
  for (const select of await listFiles(projectDir)) {
    const path = join(projectDir, select.name);
    const target = join(rawDir, select.name);
    // a directory or link of the same name in 0_RAW is not an original
    if (!(await isRegularFile(target)) || (await isSameFile(path, target))) {
      continue;
    }

    const comparison = await compareContents(path, target);
    if (!comparison.identical) {
      logger.warn(
        {
          path,
          digest: comparison.digestA,
          target: `${RAW_DIR}/${select.name}`,
          targetDigest: comparison.digestB
        },
        'Select content differs from raw original'
      );
      actions.push({
        kind: 'mismatch',
        path,
        target,
        digest: comparison.digestA,
        targetDigest: comparison.digestB
      });
      continue;
    }

    const bytes = await fileSize(path);
    logger.info({ path, target: `${RAW_DIR}/${select.name}`, dryRun }, 'Linking select');
    if (!dryRun) {
      // link beside the select, then swap it in, so the select never goes missing
      const staged = join(projectDir, `.${select.name}.link`);
      try {
        await link(target, staged);
        await rename(staged, path);
      } catch (error) {
        await rm(staged, { force: true });
        logger.error({ path, error: describeError(error) }, 'Linking select failed');
        actions.push({ kind: 'error', path, message: describeError(error) });
        continue;
      }
    }
    actions.push({ kind: 'hardlink', path, target, bytes });
  }

  return actions;
}

function totalsOf(projects: ProjectCleanup[]): CleanupTotals {
  const totals: CleanupTotals = {
    filesRemoved: 0,
    directoriesRemoved: 0,
    linksCreated: 0,
    mismatches: 0,
    errors: 0,
    bytesReclaimed: 0
  };
  for (const action of projects.flatMap(project => project.actions)) {
    switch (action.kind) {
      case 'remove-file':
        totals.filesRemoved += 1;
        totals.bytesReclaimed += action.bytes;
        break;
      case 'remove-dir':
        totals.directoriesRemoved += 1;
        totals.bytesReclaimed += action.bytes;
        break;
      case 'hardlink':
        totals.linksCreated += 1;
        totals.bytesReclaimed += action.bytes;
        break;
      case 'mismatch':
        totals.mismatches += 1;
        break;
      case 'error':
        totals.errors += 1;
        break;
    }
  }
  return totals;
}

/**
 * Clean every project of a library.
 *
 * @throws ApplicationError when the library directory does not exist
 */
export async function cleanupLibrary(
  libraryDir: string,
  options: CleanupOptions = {}
): Promise<CleanupReport> {
  const {
    removeDotFiles: removeDots = true,
    removeEdits = true,
    hardlinkSelects: linkSelects = true,
    dryRun = false
  } = options;

  const projectDirs = await findProjects(libraryDir);

  let hardlinksSupported = false;
  if (linkSelects) {
    hardlinksSupported = await areHardLinksSupported(libraryDir);
    if (!hardlinksSupported) {
      logger.warn({ libraryDir }, 'Filesystem does not support hard links, selects are kept');
    }
  }

  logger.info(
    {
      libraryDir,
      projects: projectDirs.length,
      removeDotFiles: removeDots,
      removeEdits,
      hardlinkSelects: linkSelects && hardlinksSupported,
      dryRun
    },
    'Cleaning photo library'
  );

  const projects: ProjectCleanup[] = [];
  for (const projectDir of projectDirs) {
    logger.info({ projectDir }, 'Cleaning project');
    const actions: CleanupAction[] = [];
    if (removeDots) {
      actions.push(...(await removeDotFiles(projectDir, dryRun)));
    }
    if (removeEdits) {
      actions.push(...(await removeEditFiles(projectDir, dryRun)));
    }
    if (linkSelects && hardlinksSupported) {
      actions.push(...(await hardlinkSelects(projectDir, dryRun)));
    }
    projects.push({ projectDir, actions });
  }

  const totals = totalsOf(projects);
  logger.info({ ...totals, dryRun }, 'Cleanup finished');

  return { libraryDir, dryRun, hardlinksSupported, projects, totals };
}
