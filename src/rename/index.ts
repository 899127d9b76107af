export {
  parseCaptureTimestamp,
  cameraNumber,
  buildTargetName,
  planRenames,
  renameRawFiles,
  type CaptureTimestamp,
  type RenamePlanEntry,
  type RenameOptions
} from './renamer.js';
