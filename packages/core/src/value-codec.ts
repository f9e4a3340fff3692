/**
 * @module value-codec
 * Converts property values to and from their JSON-safe document form.
 *
 * Observables are not handled here: encoding delegates them to
 * {@link EncodeHooks.encodeObservable}, and decoding delegates `$ref` markers
 * and object records to {@link DecodeHooks}. The serialization manager plugs
 * in record emission and two-phase resolution; command state plugs in plain
 * references resolved through the identity registry.
 */

import type { CommandStateContext, ObservableObject, SerializedValue } from '@reversible/types';
import {
  parseObjectRecord,
  parseOrThrow,
  refMarkerSchema,
  typedMarkerSchema,
} from './document-schema';
import type { ParsedObjectRecord } from './document-schema';
import { isPlainObject } from './equality';
import { InvalidDocumentError, SerializationTypeError } from './errors';
import { Observable } from './observable';

export interface EncodeHooks {
  /** Document form of an observable found at `path`. */
  encodeObservable(value: ObservableObject, path: string): SerializedValue;
}

export interface DecodeHooks {
  /** Value for a `{"$ref": id}` marker. */
  decodeRef(id: string): unknown;
  /** Value for a nested object record. Records are rejected when absent. */
  decodeRecord?(record: ParsedObjectRecord): unknown;
}

/** Encoding that writes every observable as a bare reference. */
export const referenceEncoding: EncodeHooks = {
  encodeObservable: (value) => ({ $ref: value.id }),
};

/** Command-state context that writes every observable as a bare reference. */
export const referenceStateContext: CommandStateContext = {
  encode: (value, path) => encodeValue(value, referenceEncoding, path),
};

/**
 * Set `key` as an own data property, `__proto__` included, which plain
 * assignment would treat as a prototype change.
 */
export function defineEntry<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Shape of a document node, decided by its keys. */
export type NodeKind = 'scalar' | 'array' | 'ref' | 'marker' | 'record' | 'object' | 'invalid';

/** Whether `value` is an observable instance. */
export function isObservable(value: unknown): value is ObservableObject {
  return value instanceof Observable;
}

/** Classify a raw document node without validating it. */
export function classifyNode(node: unknown): NodeKind {
  if (node === null || typeof node === 'string' || typeof node === 'boolean' || typeof node === 'number') {
    return 'scalar';
  }
  if (Array.isArray(node)) return 'array';
  if (!isPlainObject(node)) return 'invalid';
  if (hasKey(node, '$ref')) return 'ref';
  if (hasKey(node, '__type__')) return 'marker';
  if (looksLikeRecord(node)) return 'record';
  return 'object';
}

/**
 * Encode `value` into its document form.
 *
 * @param path - Location used in error messages, e.g. `$.owner.tags[2]`.
 * @throws SerializationTypeError for functions, symbols, bigints, invalid
 *   dates, cyclic plain containers and instances of unregistered classes.
 */
export function encodeValue(value: unknown, hooks: EncodeHooks, path = '$'): SerializedValue {
  return encodeWith(value, hooks, path, new Set());
}

/**
 * Decode a document node.
 *
 * @throws InvalidDocumentError for malformed markers or unexpected node types.
 */
export function decodeValue(node: unknown, hooks: DecodeHooks): unknown {
  switch (classifyNode(node)) {
    case 'scalar':
      return node;
    case 'array':
      return Array.isArray(node) ? node.map((item) => decodeValue(item, hooks)) : node;
    case 'ref':
      return hooks.decodeRef(parseOrThrow(refMarkerSchema, node, 'reference marker').$ref);
    case 'marker':
      return decodeMarker(node, hooks);
    case 'record': {
      const record = parseObjectRecord(node, 'object record');
      if (!hooks.decodeRecord) {
        throw new InvalidDocumentError(`Object record "${record.id}" is not allowed here`);
      }
      return hooks.decodeRecord(record);
    }
    case 'object':
      return isPlainObject(node) ? decodeEntries(node, hooks) : node;
    case 'invalid':
      throw new InvalidDocumentError(`Unexpected ${typeof node} in document`);
  }
}

/**
 * Visit every object record nested anywhere inside `node`, depth-first, in
 * document order. Records' own properties are visited after the record.
 */
export function forEachNestedRecord(node: unknown, visit: (record: ParsedObjectRecord) => void): void {
  switch (classifyNode(node)) {
    case 'array':
      if (Array.isArray(node)) {
        for (const item of node) forEachNestedRecord(item, visit);
      }
      return;
    case 'record': {
      const record = parseObjectRecord(node, 'object record');
      visit(record);
      for (const value of Object.values(record.properties)) forEachNestedRecord(value, visit);
      return;
    }
    case 'marker': {
      const marker = parseOrThrow(typedMarkerSchema, node, 'typed marker');
      if (marker.__type__ === 'map') {
        for (const [key, value] of marker.entries) {
          forEachNestedRecord(key, visit);
          forEachNestedRecord(value, visit);
        }
      } else if (marker.__type__ === 'set') {
        for (const value of marker.values) forEachNestedRecord(value, visit);
      } else if (marker.__type__ === 'object') {
        for (const value of Object.values(objectMarkerEntries(node, marker.entries))) {
          forEachNestedRecord(value, visit);
        }
      }
      return;
    }
    case 'object':
      if (isPlainObject(node)) {
        for (const value of Object.values(node)) forEachNestedRecord(value, visit);
      }
      return;
    default:
      return;
  }
}

// ── Encoding helpers ──

function encodeWith(
  value: unknown,
  hooks: EncodeHooks,
  path: string,
  ancestors: Set<object>,
): SerializedValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : { __type__: 'number', value: nonFiniteName(value) };
    case 'undefined':
      return { __type__: 'undefined' };
    case 'bigint':
    case 'symbol':
    case 'function':
      throw new SerializationTypeError(`Cannot serialize a ${typeof value} at ${path}`);
    case 'object':
      break;
  }
  if (value === null) return null;

  if (isObservable(value)) {
    return hooks.encodeObservable(value, path);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationTypeError(`Cannot serialize an invalid date at ${path}`);
    }
    return { __type__: 'datetime', iso: value.toISOString() };
  }

  if (ancestors.has(value)) {
    throw new SerializationTypeError(`Cyclic plain container at ${path}; use an observable to share it`);
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item, i) => encodeWith(item, hooks, `${path}[${i}]`, ancestors));
    }
    if (value instanceof Map) {
      const entries: [SerializedValue, SerializedValue][] = [];
      let i = 0;
      for (const [key, entry] of value) {
        entries.push([
          encodeWith(key, hooks, `${path}<key ${i}>`, ancestors),
          encodeWith(entry, hooks, `${path}<value ${i}>`, ancestors),
        ]);
        i += 1;
      }
      return { __type__: 'map', entries };
    }
    if (value instanceof Set) {
      return {
        __type__: 'set',
        values: [...value].map((item, i) => encodeWith(item, hooks, `${path}<${i}>`, ancestors)),
      };
    }
    if (isPlainObject(value)) {
      const entries: { [key: string]: SerializedValue } = {};
      for (const [key, entry] of Object.entries(value)) {
        defineEntry(entries, key, encodeWith(entry, hooks, `${path}.${key}`, ancestors));
      }
      return needsWrapping(value) ? { __type__: 'object', entries } : entries;
    }
  } finally {
    ancestors.delete(value);
  }

  throw new SerializationTypeError(
    `Cannot serialize an instance of ${value.constructor.name} at ${path}; register it as a type`,
  );
}

function nonFiniteName(value: number): 'NaN' | 'Infinity' | '-Infinity' {
  if (Number.isNaN(value)) return 'NaN';
  return value > 0 ? 'Infinity' : '-Infinity';
}

/** Plain objects whose keys would read back as a marker or a record. */
function needsWrapping(value: Record<string, unknown>): boolean {
  return hasKey(value, '$ref') || hasKey(value, '__type__') || looksLikeRecord(value);
}

// ── Decoding helpers ──

function decodeMarker(node: unknown, hooks: DecodeHooks): unknown {
  const marker = parseOrThrow(typedMarkerSchema, node, 'typed marker');
  switch (marker.__type__) {
    case 'date':
    case 'datetime': {
      const date = new Date(marker.iso);
      if (Number.isNaN(date.getTime())) {
        throw new InvalidDocumentError(`Invalid ${marker.__type__} "${marker.iso}"`);
      }
      return date;
    }
    case 'map':
      return new Map(
        marker.entries.map(([key, value]) => [decodeValue(key, hooks), decodeValue(value, hooks)]),
      );
    case 'set':
      return new Set(marker.values.map((value) => decodeValue(value, hooks)));
    case 'object':
      return decodeEntries(objectMarkerEntries(node, marker.entries), hooks);
    case 'undefined':
      return undefined;
    case 'number':
      return marker.value === 'NaN' ? NaN : marker.value === 'Infinity' ? Infinity : -Infinity;
  }
}

function decodeEntries(entries: Record<string, unknown>, hooks: DecodeHooks): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(entries).map(([key, value]) => [key, decodeValue(value, hooks)]),
  );
}

/** Entries of an `object` marker read from the raw node, since zod drops `__proto__` keys. */
function objectMarkerEntries(node: unknown, parsed: Record<string, unknown>): Record<string, unknown> {
  if (isPlainObject(node) && isPlainObject(node.entries)) return node.entries;
  return parsed;
}

function hasKey(value: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

function looksLikeRecord(value: Record<string, unknown>): boolean {
  return hasKey(value, 'type') && hasKey(value, 'id') && hasKey(value, 'properties');
}
