/**
 * Test Image Generator
 *
 * Writes small generated images and project layouts into temp directories.
 * Uses Sharp to create the image files.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import sharp from 'sharp';

export interface TestImageOptions {
  width?: number;
  height?: number;
  format?: 'tiff' | 'jpeg' | 'png';
  color?: { r: number; g: number; b: number };
}

/**
 * Write a solid colour image file
 */
export async function writeTestImage(
  filePath: string,
  options: TestImageOptions = {}
): Promise<void> {
  const {
    width = 64,
    height = 48,
    format = 'tiff',
    color = { r: 120, g: 180, b: 220 }
  } = options;

  await mkdir(dirname(filePath), { recursive: true });
  const pipeline = sharp({ create: { width, height, channels: 3, background: color } });

  switch (format) {
    case 'tiff':
      await pipeline.tiff().toFile(filePath);
      return;
    case 'jpeg':
      await pipeline.jpeg({ quality: 90 }).toFile(filePath);
      return;
    case 'png':
      await pipeline.png().toFile(filePath);
      return;
  }
}

/**
 * Get image metadata without full decode
 */
export async function getImageInfo(filePath: string): Promise<{
  width: number;
  height: number;
  format: string;
}> {
  const metadata = await sharp(filePath).metadata();

  return {
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    format: metadata.format ?? 'unknown'
  };
}

export async function createTempDir(prefix = 'photo-tools-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file with arbitrary content, creating parent directories.
 */
export async function writeBytes(filePath: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
}
