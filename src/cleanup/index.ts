export {
  cleanupLibrary,
  removeDotFiles,
  removeEditFiles,
  hardlinkSelects,
  areHardLinksSupported,
  type CleanupAction,
  type CleanupOptions,
  type CleanupReport,
  type CleanupTotals,
  type ProjectCleanup
} from './cleanup.js';
