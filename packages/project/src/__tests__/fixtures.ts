/**
 * Observable type and temp-directory helpers shared by the project tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Observable, createSession, property } from '@reversible/core';
import type { ObservableOptions, Session, SessionOptions } from '@reversible/core';

export interface MemoProps {
  text: string;
  next: Memo | null;
}

export class Memo extends Observable<MemoProps> {
  constructor(options?: ObservableOptions) {
    super({ text: property(''), next: property<Memo | null>(null) }, options);
  }
}

/** Session with `Memo` registered; logging is silenced unless options say otherwise. */
export function memoSession(options: SessionOptions = { logLevel: 'silent' }): Session {
  const session = createSession(options);
  session.types.registerType('Memo', { type: Memo, create: (id) => new Memo({ id }) });
  return session;
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'reversible-project-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
