/**
 * @module identity
 * Identity contracts: what carries a stable id and the index of live objects.
 */

/** Anything that carries a stable, immutable identifier. */
export interface Identifiable {
  readonly id: string;
}

/** Looks objects up by id. */
export interface IdentityResolver<T extends Identifiable = Identifiable> {
  /** The object with that id, or undefined. */
  resolve(id: string): T | undefined;
}

/**
 * Weak index from id to live object.
 * The registry never keeps an object alive; it only indexes reachable ones.
 */
export interface IdentityRegistry<T extends Identifiable = Identifiable> extends IdentityResolver<T> {
  /** Number of entries whose object is still reachable. */
  readonly size: number;
  /**
   * Index `object` under its id. Idempotent for the same instance.
   * @throws IdentityConflictError when another live instance holds the id.
   */
  register(object: T): string;
  /** Index `object` under its id, replacing whatever held the id before. */
  adopt(object: T): string;
  /** The live object with that id, or undefined. */
  resolve(id: string): T | undefined;
  /** Whether a live object holds that id. */
  has(id: string): boolean;
  /** Remove the entry. The object itself is untouched. */
  unregister(id: string): void;
  /** Ids of all live entries. */
  ids(): string[];
}
