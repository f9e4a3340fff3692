/**
 * @module uuid
 * Identifier generation for observables and subscriptions.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generates a UUID v4 string.
 *
 * @returns A new UUID v4 string (e.g. "550e8400-e29b-41d4-a716-446655440000").
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Returns a generator of short sequential ids such as `sub-1`, `sub-2`.
 * Sequential ids are unique per generator only.
 */
export function createSequence(prefix: string): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
}
