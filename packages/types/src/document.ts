/**
 * @module document
 * Persisted document format.
 *
 * A document is a flat list of object records plus the ids of its roots.
 * Records may nest inside property values; every object appears as a full
 * record exactly once (first occurrence, depth-first) and as a `$ref`
 * marker everywhere else.
 */

/** JSON scalar. */
export type SerializedScalar = string | number | boolean | null;

/** Reference to an object record elsewhere in the document. */
export interface RefMarker {
  $ref: string;
}

/** Names of the typed markers. */
export type TypedMarkerName = 'date' | 'datetime' | 'map' | 'set' | 'object' | 'undefined' | 'number';

/** A value JSON cannot carry natively, tagged with `__type__`. */
export type TypedMarker =
  | { __type__: 'date'; iso: string }
  | { __type__: 'datetime'; iso: string }
  | { __type__: 'map'; entries: [SerializedValue, SerializedValue][] }
  | { __type__: 'set'; values: SerializedValue[] }
  | { __type__: 'object'; entries: { [key: string]: SerializedValue } }
  | { __type__: 'undefined' }
  | { __type__: 'number'; value: 'NaN' | 'Infinity' | '-Infinity' };

/** Full record of one observable. */
export interface ObjectRecord {
  /** Name the type is registered under. */
  type: string;
  /** Stable identifier of the object. */
  id: string;
  /** Property values, by property name. */
  properties: { [name: string]: SerializedValue };
}

/** Any value that may appear in a document. */
export type SerializedValue =
  | SerializedScalar
  | RefMarker
  | TypedMarker
  | ObjectRecord
  | SerializedValue[]
  | { [key: string]: SerializedValue };

/** Top-level persisted document. */
export interface SerializedDocument {
  /** Format version for migration support. */
  version: number;
  /** Records of the roots that were not already emitted inside another root. */
  objects: ObjectRecord[];
  /** Ids of the roots, in the order they were given. */
  roots: string[];
}
