/**
 * @module archive
 * Packs/unpacks a serialized document into/from a ZIP-based project archive.
 *
 * Archive layout:
 * - `manifest.json`: {@link ProjectManifest}
 * - `document.json`: the serialized object graph
 * - `history.json`: optional command history snapshot
 *
 * Dependencies:
 * - fflate: ZIP compression/decompression (sync API)
 * - zod: manifest validation
 */

import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import { z } from 'zod';
import { ProjectFileError, parseOrThrow } from '@reversible/core';
import type {
  HistorySnapshot,
  ProjectContents,
  ProjectManifest,
  SerializedDocument,
} from '@reversible/types';

/** Current archive layout version. */
export const PROJECT_FORMAT_VERSION = 1;

export const MANIFEST_ENTRY = 'manifest.json';
export const DOCUMENT_ENTRY = 'document.json';
export const HISTORY_ENTRY = 'history.json';

const manifestSchema = z.object({
  formatVersion: z.literal(PROJECT_FORMAT_VERSION),
  name: z.string(),
  createdAt: z.string().datetime(),
  modifiedAt: z.string().datetime(),
  hasHistory: z.boolean(),
});

/** Optional metadata and history written alongside the document. */
export interface ProjectInfo {
  /** Display name (default `Untitled`). */
  name?: string;
  /** Defaults to `modifiedAt`. */
  createdAt?: Date;
  /** Defaults to now. */
  modifiedAt?: Date;
  history?: HistorySnapshot;
}

/**
 * Serializes a document into a ZIP-based project archive.
 *
 * @returns ZIP file data.
 */
export function packProject(document: SerializedDocument, info: ProjectInfo = {}): Uint8Array {
  const modifiedAt = info.modifiedAt ?? new Date();
  const manifest: ProjectManifest = {
    formatVersion: PROJECT_FORMAT_VERSION,
    name: info.name ?? 'Untitled',
    createdAt: (info.createdAt ?? modifiedAt).toISOString(),
    modifiedAt: modifiedAt.toISOString(),
    hasHistory: info.history !== undefined,
  };

  const entries: Record<string, Uint8Array> = {
    [MANIFEST_ENTRY]: strToU8(JSON.stringify(manifest, null, 2)),
    [DOCUMENT_ENTRY]: strToU8(JSON.stringify(document)),
  };
  if (info.history) {
    entries[HISTORY_ENTRY] = strToU8(JSON.stringify(info.history));
  }
  return zipSync(entries);
}

/**
 * Reads a project archive. The document and history are parsed as JSON but
 * not validated; the serialization manager does that when rebuilding.
 *
 * @throws ProjectFileError when the data is not a ZIP archive, an entry is
 *   missing or not JSON, or the manifest is invalid.
 */
export function unpackProject(data: Uint8Array): ProjectContents {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (error) {
    throw new ProjectFileError('Not a project archive', { cause: error });
  }

  const rawManifest = readJsonEntry(entries, MANIFEST_ENTRY);
  let manifest: ProjectManifest;
  try {
    manifest = parseOrThrow(manifestSchema, rawManifest, 'project manifest');
  } catch (error) {
    throw new ProjectFileError(`Invalid ${MANIFEST_ENTRY}`, { cause: error });
  }

  const document = readJsonEntry(entries, DOCUMENT_ENTRY);
  const history = manifest.hasHistory ? readJsonEntry(entries, HISTORY_ENTRY) : null;
  return { manifest, document, history };
}

function readJsonEntry(entries: Record<string, Uint8Array>, name: string): unknown {
  const bytes = entries[name];
  if (!bytes) {
    throw new ProjectFileError(`Invalid project archive: missing ${name}`);
  }
  try {
    return JSON.parse(strFromU8(bytes));
  } catch (error) {
    throw new ProjectFileError(`Invalid project archive: ${name} is not JSON`, { cause: error });
  }
}
