export {
  RAW_DIR,
  EDIT_DIR,
  EXPORT_DIR,
  resolveProjectLocations,
  findProjects,
  listFiles,
  type ResolveOptions
} from './layout.js';
