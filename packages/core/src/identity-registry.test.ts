import { describe, it, expect } from 'vitest';
import { IdentityConflictError } from './errors';
import { IdentityRegistryImpl } from './identity-registry';
import { Note } from './__tests__/fixtures';

describe('IdentityRegistryImpl', () => {
  it('registers and resolves by id', () => {
    const registry = new IdentityRegistryImpl();
    const note = new Note({ id: 'n1' });

    expect(registry.register(note)).toBe('n1');
    expect(registry.resolve('n1')).toBe(note);
    expect(registry.has('n1')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('returns undefined for unknown ids', () => {
    const registry = new IdentityRegistryImpl();
    expect(registry.resolve('nope')).toBeUndefined();
    expect(registry.has('nope')).toBe(false);
  });

  it('is idempotent for the same instance', () => {
    const registry = new IdentityRegistryImpl();
    const note = new Note({ id: 'n1' });
    registry.register(note);
    expect(() => registry.register(note)).not.toThrow();
    expect(registry.ids()).toEqual(['n1']);
  });

  it('rejects a different live instance under the same id', () => {
    const registry = new IdentityRegistryImpl();
    registry.register(new Note({ id: 'n1' }));
    const keep = registry.resolve('n1');

    expect(() => registry.register(new Note({ id: 'n1' }))).toThrow(IdentityConflictError);
    expect(registry.resolve('n1')).toBe(keep);
  });

  it('adopt() rebinds the id to the new instance', () => {
    const registry = new IdentityRegistryImpl();
    const before = new Note({ id: 'n1' });
    const after = new Note({ id: 'n1' });
    registry.register(before);

    registry.adopt(after);

    expect(registry.resolve('n1')).toBe(after);
    expect(registry.size).toBe(1);
  });

  it('unregister() removes the entry without touching the object', () => {
    const registry = new IdentityRegistryImpl();
    const note = new Note({ id: 'n1' });
    note.set('title', 'kept');
    registry.register(note);

    registry.unregister('n1');
    registry.unregister('n1');

    expect(registry.has('n1')).toBe(false);
    expect(note.get('title')).toBe('kept');
    expect(() => registry.register(new Note({ id: 'n1' }))).not.toThrow();
  });

  it('clear() drops every entry', () => {
    const registry = new IdentityRegistryImpl();
    registry.register(new Note({ id: 'a' }));
    registry.register(new Note({ id: 'b' }));
    registry.clear();
    expect(registry.size).toBe(0);
  });
});
