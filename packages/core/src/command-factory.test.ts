import { describe, it, expect } from 'vitest';
import type { Command } from '@reversible/types';
import { CommandFactory, createDefaultCommandFactory } from './command-factory';
import { CompoundCommand } from './commands/compound-command';
import { DanglingReferenceError, InvalidDocumentError, SerializationTypeError } from './errors';
import { IdentityRegistryImpl } from './identity-registry';
import { Note } from './__tests__/fixtures';

function registryWith(...notes: Note[]): IdentityRegistryImpl {
  const identities = new IdentityRegistryImpl();
  for (const note of notes) identities.register(note);
  return identities;
}

describe('CommandFactory', () => {
  it('rebuilds a property command against the live target', () => {
    const note = new Note({ id: 'n1' });
    note.set('title', 'A');
    const factory = createDefaultCommandFactory();

    const command = factory.restore(
      {
        type: 'property',
        state: {
          target: { $ref: 'n1' },
          property: 'title',
          newValue: 'B',
          oldValue: 'A',
          description: 'Rename',
        },
      },
      registryWith(note),
    );

    expect(command.description).toBe('Rename');
    command.execute();
    expect(note.get('title')).toBe('B');
    command.undo();
    expect(note.get('title')).toBe('A');
  });

  it('resolves observable values inside the state', () => {
    const note = new Note({ id: 'n1' });
    const linked = new Note({ id: 'n2' });
    const factory = createDefaultCommandFactory();

    const command = factory.restore(
      {
        type: 'property',
        state: {
          target: { $ref: 'n1' },
          property: 'ref',
          newValue: { $ref: 'n2' },
          oldValue: null,
          description: 'Link',
        },
      },
      registryWith(note, linked),
    );
    command.execute();

    expect(note.get('ref')).toBe(linked);
  });

  it('rebuilds compound commands with their children', () => {
    const note = new Note({ id: 'n1' });
    const factory = createDefaultCommandFactory();
    const child = (property: string, value: string) => ({
      type: 'property',
      state: { target: { $ref: 'n1' }, property, newValue: value, oldValue: '', description: property },
    });

    const command = factory.restore(
      { type: 'compound', state: { name: 'Fill in', commands: [child('title', 'T'), child('body', 'B')] } },
      registryWith(note),
    );

    expect(command).toBeInstanceOf(CompoundCommand);
    expect(command.description).toBe('Fill in');
    command.execute();
    expect([note.get('title'), note.get('body')]).toEqual(['T', 'B']);
    command.undo();
    expect([note.get('title'), note.get('body')]).toEqual(['', '']);
  });

  it('fails when a target is not in the registry', () => {
    const factory = createDefaultCommandFactory();
    expect(() =>
      factory.restore(
        {
          type: 'property',
          state: { target: { $ref: 'gone' }, property: 'title', newValue: 'x', description: 'x' },
        },
        new IdentityRegistryImpl(),
      ),
    ).toThrow(DanglingReferenceError);
  });

  it('rejects unknown command types and malformed state', () => {
    const factory = createDefaultCommandFactory();
    const identities = new IdentityRegistryImpl();

    expect(() => factory.restore({ type: 'mystery', state: {} }, identities)).toThrow(
      new SerializationTypeError('No command builder registered for "mystery"'),
    );
    expect(() => factory.restore({ state: {} }, identities)).toThrow(InvalidDocumentError);
    expect(() => factory.restore({ type: 'property', state: {} }, identities)).toThrow(
      InvalidDocumentError,
    );
  });

  it('accepts custom builders and rejects a second one for the same type', () => {
    const factory = new CommandFactory();
    const calls: string[] = [];
    factory.register('log', (state): Command => ({
      description: typeof state.text === 'string' ? state.text : '',
      execute: () => calls.push('execute'),
      undo: () => calls.push('undo'),
    }));

    const command = factory.restore({ type: 'log', state: { text: 'hello' } }, new IdentityRegistryImpl());
    command.execute();

    expect(command.description).toBe('hello');
    expect(calls).toEqual(['execute']);
    expect(factory.has('log')).toBe(true);
    expect(factory.types()).toEqual(['log']);
    expect(() => factory.register('log', () => command)).toThrow(
      'Command type "log" is already registered',
    );
  });
});
