import { describe, it, expect } from 'vitest';
import { strToU8, unzipSync, zipSync } from 'fflate';
import { ProjectFileError } from '@reversible/core';
import type { SerializedDocument } from '@reversible/types';
import { DOCUMENT_ENTRY, HISTORY_ENTRY, MANIFEST_ENTRY, packProject, unpackProject } from '../archive';

const document: SerializedDocument = {
  version: 1,
  objects: [{ type: 'Memo', id: 'm1', properties: { text: 'hi', next: null } }],
  roots: ['m1'],
};

const createdAt = new Date('2024-03-01T10:00:00.000Z');
const modifiedAt = new Date('2024-03-02T11:30:00.000Z');

describe('packProject / unpackProject', () => {
  it('stores the manifest and the document', () => {
    const data = packProject(document, { name: 'Plans', createdAt, modifiedAt });

    expect(unpackProject(data)).toEqual({
      manifest: {
        formatVersion: 1,
        name: 'Plans',
        createdAt: '2024-03-01T10:00:00.000Z',
        modifiedAt: '2024-03-02T11:30:00.000Z',
        hasHistory: false,
      },
      document,
      history: null,
    });
  });

  it('writes one entry per part', () => {
    const history = { version: 1, done: [], redo: [] };
    const entries = unzipSync(packProject(document, { history }));
    expect(Object.keys(entries).sort()).toEqual([DOCUMENT_ENTRY, HISTORY_ENTRY, MANIFEST_ENTRY]);
  });

  it('carries a history snapshot when given one', () => {
    const history = {
      version: 1,
      done: [{ type: 'log', state: { text: 'x' } }],
      redo: [],
    };
    const contents = unpackProject(packProject(document, { history }));

    expect(contents.manifest?.hasHistory).toBe(true);
    expect(contents.history).toEqual(history);
  });

  it('defaults the name and uses modifiedAt as createdAt', () => {
    const { manifest } = unpackProject(packProject(document, { modifiedAt }));
    expect(manifest?.name).toBe('Untitled');
    expect(manifest?.createdAt).toBe('2024-03-02T11:30:00.000Z');
  });

  it('rejects data that is not a ZIP archive', () => {
    expect(() => unpackProject(new Uint8Array(64))).toThrow(
      new ProjectFileError('Not a project archive'),
    );
  });

  it('rejects an archive without a document', () => {
    const manifest = {
      formatVersion: 1,
      name: 'x',
      createdAt: createdAt.toISOString(),
      modifiedAt: modifiedAt.toISOString(),
      hasHistory: false,
    };
    const data = zipSync({ [MANIFEST_ENTRY]: strToU8(JSON.stringify(manifest)) });

    expect(() => unpackProject(data)).toThrow('Invalid project archive: missing document.json');
  });

  it('rejects an invalid manifest', () => {
    const data = zipSync({
      [MANIFEST_ENTRY]: strToU8(JSON.stringify({ formatVersion: 9 })),
      [DOCUMENT_ENTRY]: strToU8(JSON.stringify(document)),
    });
    expect(() => unpackProject(data)).toThrow('Invalid manifest.json');
  });

  it('rejects entries that are not JSON', () => {
    const data = zipSync({ [MANIFEST_ENTRY]: strToU8('{oops') });
    expect(() => unpackProject(data)).toThrow('Invalid project archive: manifest.json is not JSON');
  });
});
