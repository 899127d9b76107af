/**
 * Metadata module - EXIF reading and writing
 *
 * - ExifTool-backed metadata store
 * - Exiv2 to ExifTool tag naming
 * - Tag list copied into exports
 */

export {
  createExifToolStore,
  closeExifTool,
  formatTagValue,
  toAssignment,
  type MetadataStore,
  type ExifToolClient
} from './exif.js';

export {
  DATE_TIME_ORIGINAL,
  EXPORT_TAGS,
  toExifToolName,
  toExifToolGroup,
  isNumericValueType
} from './tags.js';
