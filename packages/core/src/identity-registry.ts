/**
 * @module identity-registry
 * Weak index of live objects by their stable id.
 *
 * @see {@link @reversible/types#IdentityRegistry} for the interface contract
 */

import type { Identifiable, IdentityRegistry, ObservableObject } from '@reversible/types';
import { IdentityConflictError } from './errors';

interface Held<T extends Identifiable> {
  id: string;
  ref: WeakRef<T>;
}

/**
 * Concrete implementation of {@link IdentityRegistry} over `WeakRef`.
 *
 * Entries whose object was collected are dropped by a `FinalizationRegistry`
 * callback, and are treated as absent before that callback runs.
 */
export class IdentityRegistryImpl<T extends Identifiable = ObservableObject>
  implements IdentityRegistry<T>
{
  private readonly entries = new Map<string, WeakRef<T>>();
  private readonly finalizer = new FinalizationRegistry<Held<T>>(({ id, ref }) => {
    if (this.entries.get(id) === ref) {
      this.entries.delete(id);
    }
  });

  /** @inheritdoc */
  get size(): number {
    return this.ids().length;
  }

  /** @inheritdoc */
  register(object: T): string {
    const current = this.resolve(object.id);
    if (current === object) return object.id;
    if (current) throw new IdentityConflictError(object.id);
    return this.bind(object);
  }

  /** @inheritdoc */
  adopt(object: T): string {
    if (this.resolve(object.id) === object) return object.id;
    return this.bind(object);
  }

  /** @inheritdoc */
  resolve(id: string): T | undefined {
    return this.entries.get(id)?.deref();
  }

  /** @inheritdoc */
  has(id: string): boolean {
    return this.resolve(id) !== undefined;
  }

  /** @inheritdoc */
  unregister(id: string): void {
    const ref = this.entries.get(id);
    if (!ref) return;
    this.finalizer.unregister(ref);
    this.entries.delete(id);
  }

  /** @inheritdoc */
  ids(): string[] {
    const live: string[] = [];
    for (const [id, ref] of this.entries) {
      if (ref.deref() !== undefined) live.push(id);
    }
    return live;
  }

  /** Drop every entry. */
  clear(): void {
    for (const ref of this.entries.values()) {
      this.finalizer.unregister(ref);
    }
    this.entries.clear();
  }

  private bind(object: T): string {
    this.unregister(object.id);
    const ref = new WeakRef(object);
    this.entries.set(object.id, ref);
    this.finalizer.register(object, { id: object.id, ref }, ref);
    return object.id;
  }
}
