/**
 * @module observable
 * Change-notification contracts.
 */

import type { Identifiable } from './identity';

/** Payload delivered to property observers. */
export interface PropertyChange<T = unknown> {
  /** Name of the property that changed. */
  property: string;
  oldValue: T;
  newValue: T;
  /** The object whose property changed. */
  source: ObservableObject;
}

/** Callback invoked after a property value changed. */
export type PropertyObserver<T = unknown> = (change: PropertyChange<T>) => void;

/** Opaque handle returned by `addObserver`. */
export type SubscriptionId = string;

/**
 * Type-erased view of an observable, addressed by property name.
 * Serialization and generic tooling work through this view; application code
 * normally uses the typed `get`/`set` of the concrete class.
 */
export interface ObservableObject extends Identifiable {
  /** Declared property names, in declaration order. */
  propertyNames(): readonly string[];
  /** Whether `name` is a declared property. */
  hasProperty(name: string): boolean;
  /** Current value (or declared default) of a declared property. */
  getProperty(name: string): unknown;
  /** Write a declared property, notifying observers on change. */
  setProperty(name: string, value: unknown): void;
  /** Subscribe to changes of a declared property. */
  observeProperty(name: string, callback: PropertyObserver): SubscriptionId;
  /** Remove a subscription. Removing an unknown id is a no-op. */
  removeObserver(name: string, subscription: SubscriptionId): void;
}
