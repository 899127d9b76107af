/**
 * Tag naming.
 *
 * Rule files and the rest of the tools name tags the Exiv2 way
 * (`Exif.Photo.LensModel`); ExifTool names the same tag `LensModel`.
 */

import type { ValueType } from '../types/index.js';

export const DATE_TIME_ORIGINAL = 'Exif.Photo.DateTimeOriginal';

/**
 * Tags copied from a camera original to an exported JPEG.
 */
export const EXPORT_TAGS = [
  'Exif.Image.Artist',
  'Exif.Image.Copyright',
  'Exif.Image.DateTime',
  'Exif.Image.Make',
  'Exif.Image.Model',
  'Exif.Image.Software',
  'Exif.Photo.ApertureValue',
  'Exif.Photo.BrightnessValue',
  'Exif.Photo.DateTimeDigitized',
  'Exif.Photo.DateTimeOriginal',
  'Exif.Photo.ExifVersion',
  'Exif.Photo.ExposureBiasValue',
  'Exif.Photo.ExposureProgram',
  'Exif.Photo.ExposureTime',
  'Exif.Photo.Flash',
  'Exif.Photo.FNumber',
  'Exif.Photo.FocalLength',
  'Exif.Photo.FocalLengthIn35mmFilm',
  'Exif.Photo.ISOSpeedRatings',
  'Exif.Photo.LensMake',
  'Exif.Photo.LensModel',
  'Exif.Photo.LensSpecification',
  'Exif.Photo.LightSource',
  'Exif.Photo.MaxApertureValue',
  'Exif.Photo.MeteringMode',
  'Exif.Photo.SensitivityType',
  'Exif.Photo.ShutterSpeedValue'
] as const;

// Exiv2 keys whose ExifTool name is not simply the last key segment
const EXIFTOOL_ALIASES: Readonly<Record<string, string>> = {
  'Exif.Image.DateTime': 'ModifyDate',
  'Exif.Photo.DateTimeDigitized': 'CreateDate',
  'Exif.Photo.ExposureBiasValue': 'ExposureCompensation',
  'Exif.Photo.FocalLengthIn35mmFilm': 'FocalLengthIn35mmFormat',
  'Exif.Photo.ISOSpeedRatings': 'ISO',
  'Exif.Photo.LensSpecification': 'LensInfo',
  'Exif.Photo.PixelXDimension': 'ExifImageWidth',
  'Exif.Photo.PixelYDimension': 'ExifImageHeight'
};

const NUMERIC_VALUE_TYPES: ReadonlySet<ValueType> = new Set([
  'Byte',
  'Short',
  'Long',
  'Rational',
  'SByte',
  'SShort',
  'SLong',
  'SRational',
  'Float',
  'Double'
]);

/**
 * ExifTool tag name for an Exiv2 key.
 */
export function toExifToolName(key: string): string {
  const alias = EXIFTOOL_ALIASES[key];
  if (alias !== undefined) {
    return alias;
  }
  return key.split('.').at(-1) ?? key;
}

/**
 * ExifTool write group for an Exiv2 key: `Xmp.*` keys go to XMP, the rest to EXIF.
 */
export function toExifToolGroup(key: string): 'EXIF' | 'XMP' {
  return key.startsWith('Xmp.') ? 'XMP' : 'EXIF';
}

/**
 * Numeric values are written without ExifTool's print conversion, so
 * `Rational` `1.5` lands as 3/2 rather than being parsed as text.
 */
export function isNumericValueType(valueType: ValueType): boolean {
  return NUMERIC_VALUE_TYPES.has(valueType);
}
