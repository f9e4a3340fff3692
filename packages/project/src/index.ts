/**
 * @reversible/project
 *
 * Project archives, atomic file writes, and save/load coordination.
 *
 * @packageDocumentation
 */

export {
  packProject,
  unpackProject,
  PROJECT_FORMAT_VERSION,
  MANIFEST_ENTRY,
  DOCUMENT_ENTRY,
  HISTORY_ENTRY,
} from './archive';
export type { ProjectInfo } from './archive';
export { encodeProject, decodeProject, formatForPath, PROJECT_EXTENSION } from './format';
export { writeFileAtomic, tempPathFor } from './atomic-write';
export { ProjectStore } from './project-store';
export type { ProjectStoreOptions } from './project-store';
