/**
 * Export rendering
 *
 * Edits are shrunk to fit a size preset and framed in a light gray border
 * with thin separator lines between the photo and the border:
 *
 *   border | separators (outermost last) | photo | separators | border
 *                                                              + bottom padding
 *
 * Rendering goes through sharp. Every frame layer is a separate `extend`
 * over raw pixels, since sharp keeps one `extend` per pipeline.
 */

import sharp from 'sharp';
import type { OutputInfo } from 'sharp';

import { ConfigError } from '../lib/errors.js';
import type { ExportSize } from '../types/index.js';

export interface GrayColor {
  r: number;
  g: number;
  b: number;
}

const gray = (level: number): GrayColor => {
  const value = Math.round(level * 255);
  return { r: value, g: value, b: value };
};

export const BORDER_COLOR = gray(0.96);
export const SEPARATOR_LIGHT_COLOR = gray(0.8);
export const SEPARATOR_DARK_COLOR = gray(0.6);

export interface SeparatorOptions {
  color: GrayColor;
  size: number;
}

export interface BorderOptions {
  color: GrayColor;
  size: number;
  bottomPadding: number;
  /** Applied in order, from the photo edge outwards */
  separators: SeparatorOptions[];
}

export interface ResizeOptions {
  width: number;
  height: number;
  quality: number;
  border: BorderOptions | null;
}

export const EXPORT_SIZES: readonly ExportSize[] = ['large', 'medium', 'small'];

interface SizePreset {
  width: number;
  height: number;
  quality: number;
  borderSize: number;
  bottomPadding: number;
  darkSeparatorSize: number;
}

const SIZE_PRESETS: Record<ExportSize, SizePreset> = {
  large: {
    width: 4000,
    height: 3500,
    quality: 99,
    borderSize: 100,
    bottomPadding: 20,
    darkSeparatorSize: 2
  },
  medium: {
    width: 2000,
    height: 1500,
    quality: 97,
    borderSize: 40,
    bottomPadding: 10,
    darkSeparatorSize: 1
  },
  small: {
    width: 900,
    height: 800,
    quality: 95,
    borderSize: 20,
    bottomPadding: 5,
    darkSeparatorSize: 1
  }
};

export function isExportSize(value: string): value is ExportSize {
  return (EXPORT_SIZES as readonly string[]).includes(value);
}

/**
 * Resize options of a size preset.
 *
 * @throws ConfigError for an unknown size
 */
export function getResizeOptions(size: string, addBorder: boolean): ResizeOptions {
  if (!isExportSize(size)) {
    throw new ConfigError(`Size ${size} is not supported (expected ${EXPORT_SIZES.join(', ')})`);
  }
  const preset = SIZE_PRESETS[size];

  return {
    width: preset.width,
    height: preset.height,
    quality: preset.quality,
    border: addBorder
      ? {
          color: BORDER_COLOR,
          size: preset.borderSize,
          bottomPadding: preset.bottomPadding,
          separators: [
            { color: SEPARATOR_LIGHT_COLOR, size: 1 },
            { color: SEPARATOR_DARK_COLOR, size: preset.darkSeparatorSize },
            { color: SEPARATOR_LIGHT_COLOR, size: 1 }
          ]
        }
      : null
  };
}

export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: OutputInfo['channels'];
}

async function extendRaw(
  image: RawImage,
  edges: { top: number; bottom: number; left: number; right: number },
  background: GrayColor
): Promise<RawImage> {
  const { data, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .extend({ ...edges, background })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
}

/**
 * Add separators, border and bottom padding around raw pixels.
 */
export async function frameImage(image: RawImage, border: BorderOptions): Promise<RawImage> {
  let framed = image;
  for (const separator of border.separators) {
    const size = separator.size;
    framed = await extendRaw(
      framed,
      { top: size, bottom: size, left: size, right: size },
      separator.color
    );
  }
  return extendRaw(
    framed,
    {
      top: border.size,
      bottom: border.size + border.bottomPadding,
      left: border.size,
      right: border.size
    },
    border.color
  );
}

/**
 * Render an edit into an export JPEG. The output carries no metadata.
 *
 * @returns Dimensions of the written JPEG
 */
export async function renderExport(
  sourceFile: string,
  targetFile: string,
  options: ResizeOptions
): Promise<{ width: number; height: number }> {
  const { data, info } = await sharp(sourceFile)
    .rotate()
    .resize({
      width: options.width,
      height: options.height,
      fit: 'inside',
      withoutEnlargement: true,
      kernel: sharp.kernel.lanczos3
    })
    .removeAlpha()
    .toColourspace('srgb')
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });

  let image: RawImage = { data, width: info.width, height: info.height, channels: info.channels };
  if (options.border) {
    image = await frameImage(image, options.border);
  }

  const written = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .jpeg({ quality: options.quality })
    .toFile(targetFile);

  return { width: written.width, height: written.height };
}
