import { describe, it, expect } from 'vitest';
import { strToU8 } from 'fflate';
import { ProjectFileError } from '@reversible/core';
import type { SerializedDocument } from '@reversible/types';
import { decodeProject, encodeProject, formatForPath } from '../format';

const document: SerializedDocument = {
  version: 1,
  objects: [{ type: 'Memo', id: 'm1', properties: { text: 'hi' } }],
  roots: ['m1'],
};

describe('formatForPath', () => {
  it('picks the format from the extension, ignoring case', () => {
    expect(formatForPath('/work/plan.rvp')).toBe('archive');
    expect(formatForPath('/work/PLAN.RVP')).toBe('archive');
    expect(formatForPath('plan.json')).toBe('json');
  });

  it('rejects other extensions', () => {
    expect(() => formatForPath('plan.txt')).toThrow(
      new ProjectFileError('Unsupported project file extension ".txt" for plan.txt'),
    );
    expect(() => formatForPath('plan')).toThrow(
      'Unsupported project file extension "(none)" for plan',
    );
  });
});

describe('encodeProject / decodeProject', () => {
  it('writes the JSON format as the bare document', () => {
    const data = encodeProject(document, 'json', { name: 'ignored' });

    expect(decodeProject(data, 'json')).toEqual({ manifest: null, document, history: null });
  });

  it('writes the archive format with a manifest', () => {
    const contents = decodeProject(encodeProject(document, 'archive', { name: 'Plans' }), 'archive');

    expect(contents.manifest?.name).toBe('Plans');
    expect(contents.document).toEqual(document);
  });

  it('rejects JSON-format bytes that are not JSON', () => {
    expect(() => decodeProject(strToU8('nope'), 'json')).toThrow('Project file is not JSON');
  });
});
