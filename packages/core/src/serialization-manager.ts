/**
 * @module serialization-manager
 * Writes observable graphs to {@link SerializedDocument}s and rebuilds them.
 *
 * Writing is depth-first from the roots: the first occurrence of an object is
 * a full record, later occurrences are `$ref` markers. Reading runs in two
 * phases so that references may point forward or form cycles:
 *
 * 1. creation: every record, top-level or nested, gets a bare instance;
 * 2. resolution: properties are decoded and applied, references resolving
 *    to the instances built in phase 1.
 *
 * Instances are adopted into the identity registry only once both phases
 * succeeded; a failing document leaves the registry untouched.
 *
 * @see {@link @reversible/types#SerializationManager} for the interface contract
 */

import type {
  DeserializedGraph,
  DeserializeOptions,
  IdentityRegistry,
  Logger,
  ObjectRecord,
  ObservableObject,
  SerializationManager,
  SerializationRegistry,
  SerializedDocument,
  SerializedValue,
  SerializeOptions,
  TypeRegistration,
} from '@reversible/types';
import {
  DOCUMENT_VERSION,
  documentEnvelopeSchema,
  parseObjectRecord,
  parseOrThrow,
} from './document-schema';
import type { ParsedObjectRecord } from './document-schema';
import {
  DanglingReferenceError,
  IdentityConflictError,
  InvalidDocumentError,
  SerializationTypeError,
} from './errors';
import { createLogger } from './logger';
import { decodeValue, defineEntry, encodeValue, forEachNestedRecord } from './value-codec';
import type { DecodeHooks, EncodeHooks } from './value-codec';

export interface SerializationManagerOptions {
  registry: SerializationRegistry;
  identities: IdentityRegistry<ObservableObject>;
  logger?: Logger;
}

interface CreatedObject {
  instance: ObservableObject;
  record: ParsedObjectRecord;
  registration: TypeRegistration;
}

/** Concrete implementation of {@link SerializationManager}. */
export class SerializationManagerImpl implements SerializationManager {
  private readonly registry: SerializationRegistry;
  private readonly identities: IdentityRegistry<ObservableObject>;
  private readonly logger: Logger;

  constructor(options: SerializationManagerOptions) {
    this.registry = options.registry;
    this.identities = options.identities;
    this.logger = options.logger ?? createLogger('serialization');
  }

  /**
   * @inheritdoc
   * @throws SerializationTypeError for unregistered types and values without
   *   a serializable form
   * @throws IdentityConflictError when two instances in the graph share an id
   */
  serialize(roots: readonly ObservableObject[], options: SerializeOptions = {}): SerializedDocument {
    const emitted = new Map<string, ObservableObject>();
    const isInside = (object: ObservableObject): boolean =>
      options.boundary ? options.boundary(object) : true;

    const hooks: EncodeHooks = {
      encodeObservable: (object, path) => {
        const seen = emitted.get(object.id);
        if (seen) {
          if (seen !== object) throw new IdentityConflictError(object.id);
          return { $ref: object.id };
        }
        if (!isInside(object)) return { $ref: object.id };
        return this.writeRecord(object, path, emitted, hooks);
      },
    };

    const objects: ObjectRecord[] = [];
    for (const [i, root] of roots.entries()) {
      const seen = emitted.get(root.id);
      if (seen) {
        if (seen !== root) throw new IdentityConflictError(root.id);
        continue;
      }
      objects.push(this.writeRecord(root, `$.roots[${i}]`, emitted, hooks));
    }
    for (const [i, object] of (options.retain ?? []).entries()) {
      const seen = emitted.get(object.id);
      if (seen) {
        if (seen !== object) throw new IdentityConflictError(object.id);
        continue;
      }
      objects.push(this.writeRecord(object, `$.retain[${i}]`, emitted, hooks));
    }

    for (const object of emitted.values()) {
      if (!this.identities.has(object.id)) this.identities.register(object);
    }
    this.logger.debug(`Serialized ${emitted.size} object(s) from ${roots.length} root(s)`);
    return { version: DOCUMENT_VERSION, objects, roots: roots.map((root) => root.id) };
  }

  /**
   * @inheritdoc
   * @throws InvalidDocumentError for malformed input or duplicate ids
   * @throws SerializationTypeError for unknown type names
   * @throws DanglingReferenceError for references to missing records
   */
  deserialize(document: unknown, options: DeserializeOptions = {}): ObservableObject[] {
    return this.deserializeGraph(document, options).roots;
  }

  /** @inheritdoc */
  deserializeGraph(document: unknown, options: DeserializeOptions = {}): DeserializedGraph {
    const envelope = parseOrThrow(documentEnvelopeSchema, document, 'document');

    // Phase 1: creation.
    const created = new Map<string, CreatedObject>();
    const create = (record: ParsedObjectRecord): void => {
      if (created.has(record.id)) {
        throw new InvalidDocumentError(`Duplicate object id "${record.id}"`);
      }
      const registration = this.registry.lookup(record.type);
      if (!registration) {
        throw new SerializationTypeError(`Unknown type "${record.type}" for object "${record.id}"`);
      }
      const instance = registration.create(record.id);
      if (instance.id !== record.id) {
        throw new SerializationTypeError(
          `create() of "${record.type}" returned id "${instance.id}" instead of "${record.id}"`,
        );
      }
      created.set(record.id, { instance, record, registration });
    };
    envelope.objects.forEach((node, i) => {
      const record = parseObjectRecord(node, `object record ${i}`);
      forEachNestedRecord(record, create);
    });

    // Phase 2: resolution.
    const resolve = (id: string): ObservableObject => {
      const entry = created.get(id);
      if (entry) return entry.instance;
      const external = options.resolveExternal ? this.identities.resolve(id) : undefined;
      if (external) return external;
      throw new DanglingReferenceError(id);
    };
    const hooks: DecodeHooks = {
      decodeRef: resolve,
      decodeRecord: (record) => resolve(record.id),
    };
    for (const { instance, record, registration } of created.values()) {
      const properties: { [name: string]: unknown } = {};
      for (const [name, node] of Object.entries(record.properties)) {
        defineEntry(properties, name, decodeValue(node, hooks));
      }
      if (registration.deserialize) {
        registration.deserialize(instance, properties);
      } else {
        this.applyProperties(instance, record, properties);
      }
    }

    // Phase 3: roots, then identity.
    const roots = envelope.roots.map(resolve);
    for (const { instance } of created.values()) {
      this.identities.adopt(instance);
    }
    this.logger.debug(`Deserialized ${created.size} object(s), ${roots.length} root(s)`);
    const objects = new Map<string, ObservableObject>();
    for (const [id, { instance }] of created) objects.set(id, instance);
    return { roots, objects };
  }

  /** @inheritdoc */
  stringify(
    roots: readonly ObservableObject[],
    options: SerializeOptions & { indent?: number } = {},
  ): string {
    return JSON.stringify(this.serialize(roots, options), null, options.indent);
  }

  /** @inheritdoc */
  parse(text: string, options: DeserializeOptions = {}): ObservableObject[] {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new InvalidDocumentError('Document is not valid JSON', { cause: error });
    }
    return this.deserialize(document, options);
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private writeRecord(
    object: ObservableObject,
    path: string,
    emitted: Map<string, ObservableObject>,
    hooks: EncodeHooks,
  ): ObjectRecord {
    const type = this.registry.typeNameOf(object);
    const registration = type === undefined ? undefined : this.registry.lookup(type);
    if (type === undefined || !registration) {
      throw new SerializationTypeError(
        `${object.constructor.name} at ${path} is not a registered type`,
      );
    }
    // Mark before descending so cycles back to this object become references.
    emitted.set(object.id, object);

    const encode = (value: unknown, name: string): SerializedValue =>
      encodeValue(value, hooks, `${path}.${name}`);
    let properties: { [name: string]: SerializedValue };
    if (registration.serialize) {
      properties = registration.serialize(object, { encode });
    } else {
      properties = {};
      for (const name of object.propertyNames()) {
        defineEntry(properties, name, encode(object.getProperty(name), name));
      }
    }
    return { type, id: object.id, properties };
  }

  private applyProperties(
    instance: ObservableObject,
    record: ParsedObjectRecord,
    properties: { [name: string]: unknown },
  ): void {
    for (const [name, value] of Object.entries(properties)) {
      if (!instance.hasProperty(name)) {
        this.logger.warn(`Skipping unknown property "${name}" of ${record.type} "${record.id}"`);
        continue;
      }
      instance.setProperty(name, value);
    }
  }
}
