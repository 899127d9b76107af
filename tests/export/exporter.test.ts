import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { listEdits, processForExport } from '../../src/export/exporter.js';
import {
  buildExportTags,
  exportTargetName,
  findMetadataSource,
  metadataSourceStem
} from '../../src/export/metadata-copy.js';
import { resolveProjectLocations } from '../../src/library/layout.js';
import { ApplicationError, ConfigError, MetadataReadError } from '../../src/lib/errors.js';
import { parseRuleSet } from '../../src/rules/loader.js';
import { createMemoryStore, type MemoryStore } from '../helpers/memory-store.js';
import {
  createTempDir,
  getImageInfo,
  removeTempDir,
  writeBytes,
  writeTestImage
} from '../helpers/test-images.js';

const ORIGINAL = {
  'Exif.Image.Make': 'NIKON CORPORATION',
  'Exif.Image.Model': 'NIKON Z 6',
  'Exif.Photo.DateTimeOriginal': '2024:05:01 10:32:15',
  'Exif.Photo.FNumber': '1.2',
  'Exif.Photo.LensModel': 'Nokton 35mm f/1.2',
  'Exif.Photo.UserComment': 'not exported'
};

const LENS_RULES = {
  rules: [
    {
      pattern: { tag: 'Exif.Photo.LensModel', value_regex: 'Nokton' },
      tags: [
        { name: 'Exif.Photo.FNumber', value: '1.5', value_type: 'Rational' },
        { name: 'Exif.Photo.LensMake', value: 'Voigtlander' }
      ]
    }
  ]
};

describe('Export', () => {
  it('names exports after their edit', () => {
    expect(exportTargetName('20240501_1032_1234-Enhanced-NR')).toBe('20240501_1032_1234');
    expect(exportTargetName('20240501_1032_1234-BW')).toBe('20240501_1032_1234-BW');
    expect(metadataSourceStem('20240501_1032_1234-BW')).toBe('20240501_1032_1234');
    expect(metadataSourceStem('20240501_1032_1234-Enhanced-NR')).toBe('20240501_1032_1234');
  });

  describe('buildExportTags', () => {
    it('copies exported tags and applies overrides on top', () => {
      const { tags, overrides } = buildExportTags(ORIGINAL, parseRuleSet(LENS_RULES));

      expect(tags).toEqual([
        { name: 'Exif.Image.Make', value: 'NIKON CORPORATION', valueType: 'Ascii' },
        { name: 'Exif.Image.Model', value: 'NIKON Z 6', valueType: 'Ascii' },
        { name: 'Exif.Photo.DateTimeOriginal', value: '2024:05:01 10:32:15', valueType: 'Ascii' },
        { name: 'Exif.Photo.LensModel', value: 'Nokton 35mm f/1.2', valueType: 'Ascii' },
        { name: 'Exif.Photo.FNumber', value: '1.5', valueType: 'Rational' },
        { name: 'Exif.Photo.LensMake', value: 'Voigtlander', valueType: 'Ascii' }
      ]);
      expect(overrides).toHaveLength(2);
    });

    it('copies tags unchanged without rules', () => {
      const { tags, overrides } = buildExportTags({ 'Exif.Image.Artist': 'J. Smith' }, []);

      expect(tags).toEqual([{ name: 'Exif.Image.Artist', value: 'J. Smith', valueType: 'Ascii' }]);
      expect(overrides).toEqual([]);
    });
  });

  describe('with a project', () => {
    let projectDir: string;
    let rawDir: string;
    let editDir: string;
    let exportDir: string;
    let store: MemoryStore;

    beforeEach(async () => {
      projectDir = await createTempDir();
      rawDir = join(projectDir, '0_RAW');
      editDir = join(projectDir, '1_EDIT');
      exportDir = join(projectDir, '2_EXPORT');
      store = createMemoryStore();
    });

    afterEach(async () => {
      await removeTempDir(projectDir);
    });

    describe('findMetadataSource', () => {
      it('prefers the out-of-camera JPEG', async () => {
        await writeBytes(join(rawDir, '20240501_1032_1234.nef'), 'raw');
        await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');
        const locations = await resolveProjectLocations(projectDir);

        expect(await findMetadataSource(locations, '20240501_1032_1234-BW')).toBe(
          join(rawDir, '20240501_1032_1234.jpg')
        );
      });

      it('falls back to any original, then to the project directory', async () => {
        await writeBytes(join(rawDir, '20240501_1032_1234.nef'), 'raw');
        await writeBytes(join(projectDir, '20240501_1032_5678.nef'), 'raw');
        const locations = await resolveProjectLocations(projectDir);

        expect(await findMetadataSource(locations, '20240501_1032_1234')).toBe(
          join(rawDir, '20240501_1032_1234.nef')
        );
        expect(await findMetadataSource(locations, '20240501_1032_5678')).toBe(
          join(projectDir, '20240501_1032_5678.nef')
        );
      });

      it('fails when there is no original', async () => {
        await writeBytes(join(rawDir, '20240501_1032_1234.nef'), 'raw');
        const locations = await resolveProjectLocations(projectDir);

        await expect(findMetadataSource(locations, '20240601_0900_0001')).rejects.toThrow(
          new MetadataReadError(
            join(rawDir, '20240601_0900_0001*.*'),
            'No files found to copy metadata from'
          ).message
        );
      });
    });

    it('lists TIFF edits only', async () => {
      await writeBytes(join(editDir, 'b.tiff'), 'tif');
      await writeBytes(join(editDir, 'a.tif'), 'tif');
      await writeBytes(join(editDir, 'a.psd'), 'psd');

      expect(await listEdits(editDir)).toEqual([
        { stem: 'a', file: join(editDir, 'a.tif') },
        { stem: 'b', file: join(editDir, 'b.tiff') }
      ]);
    });

    it('fails without edits', async () => {
      await writeBytes(join(editDir, 'a.psd'), 'psd');

      await expect(listEdits(editDir)).rejects.toThrow(`No "*.tif" files found in "${editDir}"`);
    });

    it('exports edits with the metadata of their originals', async () => {
      await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');
      store.files.set(join(rawDir, '20240501_1032_1234.jpg'), { ...ORIGINAL });
      await writeTestImage(join(editDir, '20240501_1032_1234-Enhanced-NR.tif'), {
        width: 200,
        height: 100
      });
      await writeTestImage(join(editDir, '20240501_1032_1234-BW.tif'), { width: 200, height: 100 });
      const rulesPath = join(projectDir, 'rules.json');
      await writeFile(rulesPath, JSON.stringify(LENS_RULES));

      const summary = await processForExport(projectDir, { size: 'small', rulesPath, store });

      expect(summary.outcomes).toEqual([
        { status: 'done', file: '20240501_1032_1234-BW', target: '20240501_1032_1234-BW.jpg' },
        {
          status: 'done',
          file: '20240501_1032_1234-Enhanced-NR',
          target: '20240501_1032_1234.jpg'
        }
      ]);
      expect((await readdir(exportDir)).sort()).toEqual([
        '20240501_1032_1234-BW.jpg',
        '20240501_1032_1234.jpg'
      ]);
      expect(await getImageInfo(join(exportDir, '20240501_1032_1234.jpg'))).toEqual({
        width: 246,
        height: 151,
        format: 'jpeg'
      });
      expect(store.writes.map(write => write.filePath)).toEqual([
        join(exportDir, '20240501_1032_1234-BW.jpg'),
        join(exportDir, '20240501_1032_1234.jpg')
      ]);
      expect(store.files.get(join(exportDir, '20240501_1032_1234.jpg'))).toEqual({
        'Exif.Image.Make': 'NIKON CORPORATION',
        'Exif.Image.Model': 'NIKON Z 6',
        'Exif.Photo.DateTimeOriginal': '2024:05:01 10:32:15',
        'Exif.Photo.FNumber': '1.5',
        'Exif.Photo.LensModel': 'Nokton 35mm f/1.2',
        'Exif.Photo.LensMake': 'Voigtlander'
      });
    });

    it('skips edits without an original and counts failed writes', async () => {
      await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');
      await writeTestImage(join(editDir, '20240501_1032_1234.tif'), { width: 200, height: 100 });
      await writeTestImage(join(editDir, '20240601_0900_0001.tif'), { width: 200, height: 100 });
      store.unwritable.add(join(exportDir, '20240501_1032_1234.jpg'));

      const summary = await processForExport(projectDir, { size: 'small', store });

      expect(summary).toMatchObject({ done: 0, skipped: 1, failed: 1 });
      expect(summary.outcomes).toEqual([
        {
          status: 'failed',
          file: '20240501_1032_1234',
          reason: `Could not write metadata: "${join(exportDir, '20240501_1032_1234.jpg')}"`
        },
        {
          status: 'skipped',
          file: '20240601_0900_0001',
          reason: `No files found to copy metadata from: "${join(rawDir, '20240601_0900_0001*.*')}"`
        }
      ]);
    });

    it('writes nothing on a dry run', async () => {
      await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');
      await writeTestImage(join(editDir, '20240501_1032_1234.tif'));

      const summary = await processForExport(projectDir, { dryRun: true, store });

      expect(summary.outcomes).toEqual([
        { status: 'done', file: '20240501_1032_1234', target: '20240501_1032_1234.jpg' }
      ]);
      expect(await readdir(projectDir)).not.toContain('2_EXPORT');
      expect(store.writes).toEqual([]);
    });

    it('stops before the first file on invalid rules', async () => {
      await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');
      await writeTestImage(join(editDir, '20240501_1032_1234.tif'));
      const rulesPath = join(projectDir, 'rules.json');
      await writeFile(rulesPath, JSON.stringify({ rules: [{ tags: [{ value: 'x' }] }] }));

      await expect(processForExport(projectDir, { rulesPath, store })).rejects.toBeInstanceOf(
        ConfigError
      );
      expect(await readdir(projectDir)).not.toContain('2_EXPORT');
    });

    it('rejects unknown sizes', async () => {
      await expect(processForExport(projectDir, { size: 'huge', store })).rejects.toBeInstanceOf(
        ConfigError
      );
    });

    it('fails without 1_EDIT', async () => {
      await writeBytes(join(rawDir, '20240501_1032_1234.jpg'), 'jpg');

      await expect(processForExport(projectDir, { store })).rejects.toBeInstanceOf(
        ApplicationError
      );
    });
  });
});
