/**
 * EXIF Metadata Store
 *
 * Reads and writes EXIF tags through exiftool. Callers name tags the Exiv2
 * way (`Exif.Photo.LensModel`); the store translates to ExifTool names on the
 * way in and out.
 *
 * Writes only touch the tags they name. Every other tag already in the file
 * is left as it was.
 */

import { ExifTool } from 'exiftool-vendored';

import { isNumericValueType, toExifToolGroup, toExifToolName } from './tags.js';
import { env } from '../config/index.js';
import { MetadataReadError, MetadataWriteError } from '../lib/errors.js';
import type { MetadataTag } from '../types/index.js';

/**
 * Where metadata is read from and written to.
 */
export interface MetadataStore {
  /**
   * Read the named tags from a file. Tags the file does not carry are absent
   * from the result.
   *
   * @throws MetadataReadError when the file cannot be read or parsed
   */
  read(filePath: string, tagNames: readonly string[]): Promise<Record<string, string>>;

  /**
   * Merge tags into a file's metadata.
   *
   * @throws MetadataWriteError when the file cannot be updated
   */
  write(filePath: string, tags: readonly MetadataTag[]): Promise<void>;
}

/**
 * The part of exiftool's API the store uses
 */
export type ExifToolClient = Pick<ExifTool, 'read' | 'write'>;

/**
 * Singleton exiftool instance
 */
let exiftool: ExifTool | null = null;

/**
 * Get or create exiftool instance
 */
function getExifTool(): ExifTool {
  if (!exiftool) {
    exiftool = new ExifTool({
      taskTimeoutMillis: env.EXIFTOOL_TASK_TIMEOUT_MS,
      maxProcs: env.EXIFTOOL_MAX_PROCS
    });
  }
  return exiftool;
}

/**
 * Close exiftool instance (call before the process exits)
 */
export async function closeExifTool(): Promise<void> {
  if (exiftool) {
    await exiftool.end();
    exiftool = null;
  }
}

/**
 * Render a tag value the way it is written in the file: dates in their EXIF
 * `YYYY:MM:DD hh:mm:ss` form, lists space separated.
 */
export function formatTagValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .map(item => formatTagValue(item))
      .filter((item): item is string => item !== undefined);
    return parts.join(' ');
  }
  if (typeof value === 'object' && value !== null && 'rawValue' in value) {
    return typeof value.rawValue === 'string' ? value.rawValue : undefined;
  }
  return undefined;
}

/**
 * ExifTool command-line assignment for one tag, e.g. `-EXIF:FNumber#=1.5`.
 */
export function toAssignment(tag: MetadataTag): string {
  const suffix = isNumericValueType(tag.valueType) ? '#' : '';
  return `-${toExifToolGroup(tag.name)}:${toExifToolName(tag.name)}${suffix}=${tag.value}`;
}

/**
 * Metadata store backed by exiftool.
 */
export function createExifToolStore(tool: ExifToolClient = getExifTool()): MetadataStore {
  return {
    async read(filePath, tagNames) {
      let raw: Record<string, unknown>;
      try {
        raw = { ...(await tool.read(filePath)) };
      } catch (error) {
        throw new MetadataReadError(filePath, 'Could not read metadata', { cause: error });
      }

      const errors = raw.errors;
      if (Array.isArray(errors) && errors.length > 0) {
        throw new MetadataReadError(filePath, 'Could not read metadata', {
          cause: errors.join('; ')
        });
      }

      const result: Record<string, string> = {};
      for (const name of tagNames) {
        const value = formatTagValue(raw[toExifToolName(name)]);
        if (value !== undefined && value.length > 0) {
          result[name] = value;
        }
      }
      return result;
    },

    async write(filePath, tags) {
      if (tags.length === 0) {
        return;
      }
      try {
        await tool.write(
          filePath,
          {},
          { writeArgs: ['-overwrite_original', ...tags.map(toAssignment)] }
        );
      } catch (error) {
        throw new MetadataWriteError(filePath, 'Could not write metadata', { cause: error });
      }
    }
  };
}
