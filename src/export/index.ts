/**
 * Export module - resized, bordered JPEGs with EXIF copied from the originals
 */

export { processForExport, listEdits, type ExportOptions } from './exporter.js';
export {
  getResizeOptions,
  renderExport,
  frameImage,
  isExportSize,
  EXPORT_SIZES,
  BORDER_COLOR,
  SEPARATOR_LIGHT_COLOR,
  SEPARATOR_DARK_COLOR,
  type ResizeOptions,
  type BorderOptions,
  type RawImage
} from './resize.js';
export {
  exportTargetName,
  metadataSourceStem,
  findMetadataSource,
  readSourceMetadata,
  buildExportTags,
  type ExportTags
} from './metadata-copy.js';
