/**
 * Hash module - file content digests
 */

export {
  fileDigest,
  isSameFile,
  compareContents,
  type ContentComparison
} from './file-digest.js';
