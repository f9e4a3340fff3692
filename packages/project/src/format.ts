/**
 * @module format
 * Chooses and applies the on-disk encoding of a project by file extension.
 *
 * - `.rvp`: ZIP archive with manifest, document and optional history
 * - `.json`: the bare serialized document, readable by any JSON tool
 */

import * as path from 'path';
import { strFromU8, strToU8 } from 'fflate';
import { ProjectFileError } from '@reversible/core';
import type { ProjectContents, ProjectFormat, SerializedDocument } from '@reversible/types';
import { packProject, unpackProject } from './archive';
import type { ProjectInfo } from './archive';

/** Extension of project archives. */
export const PROJECT_EXTENSION = '.rvp';

const FORMAT_BY_EXTENSION: Record<string, ProjectFormat> = {
  [PROJECT_EXTENSION]: 'archive',
  '.json': 'json',
};

/**
 * Project format for a file path, decided by its extension (case-insensitive).
 * @throws ProjectFileError for any other extension.
 */
export function formatForPath(filePath: string): ProjectFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = FORMAT_BY_EXTENSION[ext];
  if (!format) {
    throw new ProjectFileError(
      `Unsupported project file extension "${ext || '(none)'}" for ${filePath}`,
    );
  }
  return format;
}

/**
 * Encode a document in `format`. The JSON format carries the document only;
 * `info` (including any history) applies to archives.
 */
export function encodeProject(
  document: SerializedDocument,
  format: ProjectFormat,
  info: ProjectInfo = {},
): Uint8Array {
  switch (format) {
    case 'archive':
      return packProject(document, info);
    case 'json':
      return strToU8(JSON.stringify(document, null, 2));
  }
}

/**
 * Decode bytes written by {@link encodeProject}.
 * @throws ProjectFileError when the bytes are not a project of that format.
 */
export function decodeProject(data: Uint8Array, format: ProjectFormat): ProjectContents {
  switch (format) {
    case 'archive':
      return unpackProject(data);
    case 'json': {
      let document: unknown;
      try {
        document = JSON.parse(strFromU8(data));
      } catch (error) {
        throw new ProjectFileError('Project file is not JSON', { cause: error });
      }
      return { manifest: null, document, history: null };
    }
  }
}
