/**
 * Photo library tools
 *
 * Programmatic entry point; the `photo-tools` command in `cli/` wraps the
 * same functions.
 */

export * from './types/index.js';
export * from './rules/index.js';
export * from './metadata/index.js';
export * from './library/index.js';
export * from './rename/index.js';
export * from './export/index.js';
export * from './cleanup/index.js';
export * from './hash/index.js';
export {
  PhotoToolsError,
  ApplicationError,
  ConfigError,
  MetadataReadError,
  MetadataWriteError,
  describeError,
  formatIssues,
  isFatal
} from './lib/errors.js';
export { logger } from './lib/logger.js';
export { runCli, createProgram } from './cli/program.js';
