import { describe, it, expect, vi } from 'vitest';
import type { PropertyChange } from '@reversible/types';
import { Observable, property } from './observable';
import type { Schema } from './observable';
import { UnknownPropertyError } from './errors';
import { Folder, Note, mockLogger } from './__tests__/fixtures';

describe('Observable', () => {
  it('returns declared defaults before any write', () => {
    const note = new Note();
    expect(note.get('title')).toBe('');
    expect(note.get('tags')).toEqual([]);
    expect(note.get('ref')).toBeNull();
  });

  it('gives each instance its own copy of a mutable default', () => {
    const first = new Note();
    const second = new Note();

    first.get('tags').push('urgent');

    expect(first.get('tags')).toEqual(['urgent']);
    expect(second.get('tags')).toEqual([]);
    expect(new Note().getProperty('tags')).toEqual([]);
  });

  it('copies map defaults without notifying', () => {
    const folder = new Folder();
    const observer = vi.fn();
    folder.addObserver('labels', observer);

    folder.get('labels').set('red', 1);

    expect(new Folder().get('labels').size).toBe(0);
    expect(folder.get('labels').get('red')).toBe(1);
    expect(observer).not.toHaveBeenCalled();
  });

  it('keeps a given id and generates distinct ids otherwise', () => {
    expect(new Note({ id: 'note-1' }).id).toBe('note-1');
    expect(new Note().id).not.toBe(new Note().id);
  });

  it('lists declared property names in declaration order', () => {
    expect(new Note().propertyNames()).toEqual(['title', 'body', 'tags', 'ref', 'due']);
  });

  describe('set', () => {
    it('stores the value and notifies observers with the change', () => {
      const note = new Note();
      const changes: PropertyChange<string>[] = [];
      note.addObserver('title', (change) => changes.push(change));

      note.set('title', 'Draft');

      expect(note.get('title')).toBe('Draft');
      expect(changes).toEqual([
        { property: 'title', oldValue: '', newValue: 'Draft', source: note },
      ]);
    });

    it('does not notify when writing the current value back', () => {
      const note = new Note();
      note.set('title', 'Same');
      const observer = vi.fn();
      note.addObserver('title', observer);

      note.set('title', note.get('title'));

      expect(observer).not.toHaveBeenCalled();
    });

    it('compares containers structurally', () => {
      const note = new Note();
      note.set('tags', ['a', 'b']);
      const observer = vi.fn();
      note.addObserver('tags', observer);

      note.set('tags', ['a', 'b']);
      expect(observer).not.toHaveBeenCalled();

      note.set('tags', ['a']);
      expect(observer).toHaveBeenCalledOnce();
    });

    it('compares dates by time value', () => {
      const note = new Note();
      note.set('due', new Date('2024-03-01T00:00:00.000Z'));
      const observer = vi.fn();
      note.addObserver('due', observer);

      note.set('due', new Date('2024-03-01T00:00:00.000Z'));

      expect(observer).not.toHaveBeenCalled();
    });

    it('uses a custom equality when the property declares one', () => {
      interface LabelProps {
        text: string;
      }
      const schema: Schema<LabelProps> = {
        text: property('', { equals: (a, b) => a.toLowerCase() === b.toLowerCase() }),
      };
      const label = new Observable<LabelProps>(schema);
      label.set('text', 'hello');
      const observer = vi.fn();
      label.addObserver('text', observer);

      label.set('text', 'HELLO');

      expect(observer).not.toHaveBeenCalled();
      expect(label.get('text')).toBe('hello');
    });

    it('notifies only observers of the written property', () => {
      const note = new Note();
      const titleObserver = vi.fn();
      const bodyObserver = vi.fn();
      note.addObserver('title', titleObserver);
      note.addObserver('body', bodyObserver);

      note.set('body', 'text');

      expect(titleObserver).not.toHaveBeenCalled();
      expect(bodyObserver).toHaveBeenCalledOnce();
    });
  });

  describe('observer isolation', () => {
    it('logs an observer error and keeps notifying the rest', () => {
      const logger = mockLogger();
      const note = new Note({ logger });
      const after = vi.fn();
      note.addObserver('title', () => {
        throw new Error('observer failed');
      });
      note.addObserver('title', after);

      expect(() => note.set('title', 'x')).not.toThrow();

      expect(after).toHaveBeenCalledOnce();
      expect(logger.error).toHaveBeenCalledOnce();
      expect(logger.error.mock.calls[0][0]).toBe(`Observer of "title" on ${note.id} threw`);
    });

    it('iterates a snapshot of the observers', () => {
      const note = new Note();
      const late = vi.fn();
      note.addObserver('title', () => {
        note.addObserver('title', late);
      });

      note.set('title', 'first');
      expect(late).not.toHaveBeenCalled();

      note.set('title', 'second');
      expect(late).toHaveBeenCalledOnce();
    });
  });

  describe('reentrancy', () => {
    it('stores a nested write to the property being notified without re-notifying', () => {
      const note = new Note({ logger: mockLogger() });
      const observer = vi.fn((change: PropertyChange<string>) => {
        note.set('title', change.newValue.toUpperCase());
      });
      note.addObserver('title', observer);

      note.set('title', 'draft');

      expect(observer).toHaveBeenCalledOnce();
      expect(note.get('title')).toBe('DRAFT');
    });

    it('notifies a nested write to a different property', () => {
      const note = new Note();
      const bodyObserver = vi.fn();
      note.addObserver('title', (change) => note.set('body', `About ${change.newValue}`));
      note.addObserver('body', bodyObserver);

      note.set('title', 'cats');

      expect(bodyObserver).toHaveBeenCalledOnce();
      expect(note.get('body')).toBe('About cats');
    });

    it('reports the notification state', () => {
      const note = new Note();
      const seen: boolean[] = [];
      note.addObserver('title', () => {
        seen.push(note.isNotifying('title'), note.isNotifying('body'), note.isNotifying());
      });

      note.set('title', 'x');

      expect(seen).toEqual([true, false, true]);
      expect(note.isNotifying()).toBe(false);
    });
  });

  describe('removeObserver', () => {
    it('stops notifications and is idempotent', () => {
      const note = new Note();
      const observer = vi.fn();
      const subscription = note.addObserver('title', observer);
      expect(note.observerCount('title')).toBe(1);

      note.removeObserver('title', subscription);
      note.removeObserver('title', subscription);
      note.set('title', 'x');

      expect(observer).not.toHaveBeenCalled();
      expect(note.observerCount('title')).toBe(0);
    });

    it('returns distinct subscription ids', () => {
      const note = new Note();
      const a = note.addObserver('title', vi.fn());
      const b = note.addObserver('title', vi.fn());
      expect(a).not.toBe(b);
    });
  });

  describe('undeclared properties', () => {
    it('throws UnknownPropertyError from every accessor', () => {
      const note = new Note();
      expect(() => note.getProperty('color')).toThrow(UnknownPropertyError);
      expect(() => note.setProperty('color', 'red')).toThrow(UnknownPropertyError);
      expect(() => note.observeProperty('color', vi.fn())).toThrow(UnknownPropertyError);
      expect(note.hasProperty('color')).toBe(false);
      expect(note.hasProperty('title')).toBe(true);
    });

    it('names the property and the type in the message', () => {
      const note = new Note();
      expect(() => note.getProperty('color')).toThrow(
        '"color" is not a declared property of Note',
      );
    });
  });
});
