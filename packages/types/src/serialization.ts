/**
 * @module serialization
 * Contracts of the serialization registry and the serialization manager.
 */

import type { SerializedDocument, SerializedValue } from './document';
import type { ObservableObject } from './observable';

/** Constructor of a registered observable type. */
export type ObservableConstructor<T extends ObservableObject = ObservableObject> = abstract new (
  ...args: never[]
) => T;

/** Services offered to a custom `serialize` hook. */
export interface SerializeHookContext {
  /** Encode a nested value the same way declared properties are encoded. */
  encode(value: unknown, name: string): SerializedValue;
}

/** How one observable type is created and (optionally) (de)serialized. */
export interface TypeRegistration<T extends ObservableObject = ObservableObject> {
  /** Constructor used to recognise instances of the type. */
  type: ObservableConstructor<T>;
  /** Build a bare instance carrying `id`, with default property values. */
  create(id: string): T;
  /**
   * Produce the `properties` of the object record. Replaces the default
   * enumeration of declared properties.
   */
  serialize?(instance: T, context: SerializeHookContext): { [name: string]: SerializedValue };
  /**
   * Apply decoded properties (references already resolved). Replaces the
   * default assignment of declared properties.
   */
  deserialize?(instance: T, properties: { [name: string]: unknown }): void;
}

/** Maps type names to registrations, and instances back to type names. */
export interface SerializationRegistry {
  /**
   * @throws Error when `name` or `registration.type` is already registered.
   */
  registerType<T extends ObservableObject>(name: string, registration: TypeRegistration<T>): void;
  /** Registration for `name`, or undefined. */
  lookup(name: string): TypeRegistration | undefined;
  /** Name of the registered type of `instance`, or undefined. */
  typeNameOf(instance: ObservableObject): string | undefined;
  /** Registered type names, in registration order. */
  typeNames(): string[];
}

export interface SerializeOptions {
  /**
   * Decides which observables belong to the written graph. Objects outside
   * it are written as bare `$ref` markers. Every object is inside by default.
   */
  boundary?(object: ObservableObject): boolean;
  /**
   * Objects written as top-level records even when the roots do not reach
   * them. They are not listed in the document's `roots`.
   */
  retain?: readonly ObservableObject[];
}

export interface DeserializeOptions {
  /**
   * Resolve references that match no record in the document against the
   * identity registry instead of failing.
   */
  resolveExternal?: boolean;
}

/** Result of {@link SerializationManager.deserializeGraph}. */
export interface DeserializedGraph {
  /** Roots in document order. */
  roots: ObservableObject[];
  /** Every object rebuilt from the document, by id. */
  objects: ReadonlyMap<string, ObservableObject>;
}

/** Writes object graphs to documents and rebuilds them. */
export interface SerializationManager {
  /** Write the graph reachable from `roots`. */
  serialize(roots: readonly ObservableObject[], options?: SerializeOptions): SerializedDocument;
  /** Rebuild a graph; returns the roots in document order. */
  deserialize(document: unknown, options?: DeserializeOptions): ObservableObject[];
  /** {@link deserialize}, also returning every rebuilt object by id. */
  deserializeGraph(document: unknown, options?: DeserializeOptions): DeserializedGraph;
  /** {@link serialize} to JSON text. */
  stringify(roots: readonly ObservableObject[], options?: SerializeOptions & { indent?: number }): string;
  /** {@link deserialize} from JSON text. */
  parse(text: string, options?: DeserializeOptions): ObservableObject[];
}
