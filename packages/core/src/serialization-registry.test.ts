import { describe, it, expect } from 'vitest';
import { SerializationRegistryImpl } from './serialization-registry';
import { Folder, Note, PinnedNote } from './__tests__/fixtures';

describe('SerializationRegistryImpl', () => {
  it('looks registrations up by name and instances up by constructor', () => {
    const registry = new SerializationRegistryImpl();
    const create = (id: string): Note => new Note({ id });
    registry.registerType('Note', { type: Note, create });

    expect(registry.lookup('Note')?.create('n1').id).toBe('n1');
    expect(registry.lookup('Missing')).toBeUndefined();
    expect(registry.typeNameOf(new Note())).toBe('Note');
    expect(registry.typeNameOf(new Folder())).toBeUndefined();
  });

  it('names an unregistered subclass after its nearest registered ancestor', () => {
    const registry = new SerializationRegistryImpl();
    registry.registerType('Note', { type: Note, create: (id) => new Note({ id }) });

    expect(registry.typeNameOf(new PinnedNote())).toBe('Note');

    registry.registerType('PinnedNote', { type: PinnedNote, create: (id) => new PinnedNote({ id }) });
    expect(registry.typeNameOf(new PinnedNote())).toBe('PinnedNote');
  });

  it('rejects duplicate names and duplicate constructors', () => {
    const registry = new SerializationRegistryImpl();
    registry.registerType('Note', { type: Note, create: (id) => new Note({ id }) });

    expect(() =>
      registry.registerType('Note', { type: Folder, create: (id) => new Folder({ id }) }),
    ).toThrow('Type name "Note" is already registered');
    expect(() =>
      registry.registerType('Memo', { type: Note, create: (id) => new Note({ id }) }),
    ).toThrow('Note is already registered as "Note"');
    expect(() =>
      registry.registerType('', { type: Folder, create: (id) => new Folder({ id }) }),
    ).toThrow('Type name must not be empty');
  });

  it('lists type names in registration order', () => {
    const registry = new SerializationRegistryImpl();
    registry.registerType('Folder', { type: Folder, create: (id) => new Folder({ id }) });
    registry.registerType('Note', { type: Note, create: (id) => new Note({ id }) });
    expect(registry.typeNames()).toEqual(['Folder', 'Note']);
  });
});
