/**
 * Library layout
 *
 * Library/
 * ├── 2024-05-01 Trip/          <- project
 * │   ├── 0_RAW/                camera files, YYYYMMDD_hhmm_nnnn.<ext>
 * │   ├── 1_EDIT/               full-size TIFF edits
 * │   ├── 2_EXPORT/             resized JPEGs
 * │   └── 20240501_1032_1234.nef  RAW selects copied from 0_RAW
 * └── ...
 */

import type { Dirent } from 'node:fs';
import { mkdir, readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { ApplicationError } from '../lib/errors.js';
import type { ProjectLocations } from '../types/index.js';

export const RAW_DIR = '0_RAW';
export const EDIT_DIR = '1_EDIT';
export const EXPORT_DIR = '2_EXPORT';

const PROJECT_DIRS: ReadonlySet<string> = new Set([RAW_DIR, EDIT_DIR, EXPORT_DIR]);

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export interface ResolveOptions {
  /** Fail unless 0_RAW exists */
  requireRaw?: boolean;
  /** Fail unless 1_EDIT exists */
  requireEdit?: boolean;
  /** Create 2_EXPORT when missing */
  createExport?: boolean;
}

/**
 * Absolute locations of a project's directories.
 *
 * @throws ApplicationError when the project or a required directory is missing
 */
export async function resolveProjectLocations(
  projectDir: string,
  options: ResolveOptions = {}
): Promise<ProjectLocations> {
  const root = resolve(projectDir);
  const locations: ProjectLocations = {
    projectDir: root,
    rawDir: join(root, RAW_DIR),
    editDir: join(root, EDIT_DIR),
    exportDir: join(root, EXPORT_DIR)
  };

  if (!(await isDirectory(root))) {
    throw new ApplicationError(`Project directory not found: "${root}"`);
  }
  if (options.requireRaw && !(await isDirectory(locations.rawDir))) {
    throw new ApplicationError(`Raw images directory not found: "${locations.rawDir}"`);
  }
  if (options.requireEdit && !(await isDirectory(locations.editDir))) {
    throw new ApplicationError(`Edited images directory not found: "${locations.editDir}"`);
  }
  if (options.createExport && !(await isDirectory(locations.exportDir))) {
    await mkdir(locations.exportDir, { recursive: true });
  }

  return locations;
}

/**
 * Find every project below a library directory. A directory holding any of
 * 0_RAW, 1_EDIT or 2_EXPORT is a project and is not searched further.
 */
export async function findProjects(libraryDir: string): Promise<string[]> {
  const root = resolve(libraryDir);
  if (!(await isDirectory(root))) {
    throw new ApplicationError(`Photo library directory not found: "${root}"`);
  }

  const projects: string[] = [];
  const visit = async (dir: string): Promise<void> => {
    const subdirs = (await readdir(dir, { withFileTypes: true })).filter(entry =>
      entry.isDirectory()
    );
    if (subdirs.some(entry => PROJECT_DIRS.has(entry.name))) {
      projects.push(dir);
      return;
    }
    for (const entry of subdirs) {
      await visit(join(dir, entry.name));
    }
  };
  await visit(root);

  return projects.sort();
}

/**
 * Regular files directly inside a directory, skipping dot files, sorted by name.
 */
export async function listFiles(dir: string): Promise<Dirent[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
