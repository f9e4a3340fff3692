/**
 * @module project
 * Project file (.rvp) format types.
 */

/** On-disk encodings of a project. */
export type ProjectFormat = 'archive' | 'json';

/** Manifest data stored in the project ZIP file. */
export interface ProjectManifest {
  /** Archive layout version for migration support. */
  formatVersion: number;
  /** Display name of the project. */
  name: string;
  /** Creation timestamp (ISO 8601). */
  createdAt: string;
  /** Last modification timestamp (ISO 8601). */
  modifiedAt: string;
  /** Whether the archive carries a command history snapshot. */
  hasHistory: boolean;
}

/** Decoded contents of a project file. */
export interface ProjectContents {
  /** Absent for plain JSON projects. */
  manifest: ProjectManifest | null;
  /** The serialized object graph, not yet validated. */
  document: unknown;
  /** The history snapshot, not yet validated; null when none was saved. */
  history: unknown;
}
