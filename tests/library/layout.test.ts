import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  findProjects,
  listFiles,
  resolveProjectLocations
} from '../../src/library/layout.js';
import { ApplicationError } from '../../src/lib/errors.js';
import { createTempDir, removeTempDir, writeBytes } from '../helpers/test-images.js';

describe('Library layout', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('resolveProjectLocations', () => {
    it('returns the project directories', async () => {
      const locations = await resolveProjectLocations(root);

      expect(locations).toEqual({
        projectDir: root,
        rawDir: join(root, '0_RAW'),
        editDir: join(root, '1_EDIT'),
        exportDir: join(root, '2_EXPORT')
      });
    });

    it('fails for a missing project', async () => {
      const missing = join(root, 'missing');

      await expect(resolveProjectLocations(missing)).rejects.toThrow(
        `Project directory not found: "${missing}"`
      );
    });

    it('fails when a required directory is missing', async () => {
      await expect(resolveProjectLocations(root, { requireRaw: true })).rejects.toThrow(
        `Raw images directory not found: "${join(root, '0_RAW')}"`
      );
      await expect(resolveProjectLocations(root, { requireEdit: true })).rejects.toBeInstanceOf(
        ApplicationError
      );
    });

    it('creates the export directory on request', async () => {
      const { exportDir } = await resolveProjectLocations(root, { createExport: true });

      expect(await listFiles(exportDir)).toEqual([]);
    });
  });

  describe('findProjects', () => {
    it('finds projects at any depth without descending into them', async () => {
      await writeBytes(join(root, 'b-trip', '0_RAW', 'a.nef'), 'raw');
      await writeBytes(join(root, '2023', 'a-wedding', '1_EDIT', 'a.tif'), 'tif');
      await writeBytes(join(root, 'c-walk', '2_EXPORT', 'a.jpg'), 'jpg');
      await writeBytes(join(root, 'c-walk', 'extra', '0_RAW', 'b.nef'), 'raw');
      await writeBytes(join(root, 'notes', 'readme.txt'), 'text');

      expect(await findProjects(root)).toEqual([
        join(root, '2023', 'a-wedding'),
        join(root, 'b-trip'),
        join(root, 'c-walk')
      ]);
    });

    it('fails for a missing library', async () => {
      const missing = join(root, 'missing');

      await expect(findProjects(missing)).rejects.toThrow(
        `Photo library directory not found: "${missing}"`
      );
    });
  });

  describe('listFiles', () => {
    it('lists regular files sorted by name, skipping dot files', async () => {
      await writeBytes(join(root, 'b.nef'), 'b');
      await writeBytes(join(root, 'a.nef'), 'a');
      await writeBytes(join(root, '._a.nef'), 'apple double');
      await writeBytes(join(root, 'sub', 'c.nef'), 'c');

      const names = (await listFiles(root)).map(file => file.name);

      expect(names).toEqual(['a.nef', 'b.nef']);
    });
  });
});
