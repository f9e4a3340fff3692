/**
 * Observable types and helpers shared by the core tests.
 */

import { vi } from 'vitest';
import type { Logger } from '@reversible/types';
import { Observable, property } from '../observable';
import type { ObservableOptions, Schema } from '../observable';

export interface NoteProps {
  title: string;
  body: string;
  tags: string[];
  ref: Note | null;
  due: Date | null;
}

const noteSchema: Schema<NoteProps> = {
  title: property(''),
  body: property(''),
  tags: property<string[]>([]),
  ref: property<Note | null>(null),
  due: property<Date | null>(null),
};

export class Note extends Observable<NoteProps> {
  constructor(options?: ObservableOptions) {
    super(noteSchema, options);
  }
}

/** A Note subclass that is never registered on its own. */
export class PinnedNote extends Note {}

export interface FolderProps {
  name: string;
  notes: Note[];
  owner: Note | null;
  labels: Map<string, number>;
}

const folderSchema: Schema<FolderProps> = {
  name: property('Folder'),
  notes: property<Note[]>([]),
  owner: property<Note | null>(null),
  labels: property(new Map<string, number>()),
};

export class Folder extends Observable<FolderProps> {
  constructor(options?: ObservableOptions) {
    super(folderSchema, options);
  }
}

/** Logger whose methods are Vitest spies. */
export function mockLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
