/**
 * @module document-schema
 * Runtime validation of persisted documents, typed markers and command state.
 *
 * Dependencies:
 * - zod: structural validation of untrusted input
 */

import { z } from 'zod';
import { isPlainObject } from './equality';
import { InvalidDocumentError } from './errors';

/** Current document format version. */
export const DOCUMENT_VERSION = 1;

export const refMarkerSchema = z.object({ $ref: z.string().min(1) }).strict();

export const objectRecordSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  properties: z.record(z.unknown()),
});

export const typedMarkerSchema = z.discriminatedUnion('__type__', [
  z.object({ __type__: z.literal('date'), iso: z.string() }),
  z.object({ __type__: z.literal('datetime'), iso: z.string() }),
  z.object({ __type__: z.literal('map'), entries: z.array(z.tuple([z.unknown(), z.unknown()])) }),
  z.object({ __type__: z.literal('set'), values: z.array(z.unknown()) }),
  z.object({ __type__: z.literal('object'), entries: z.record(z.unknown()) }),
  z.object({ __type__: z.literal('undefined') }),
  z.object({ __type__: z.literal('number'), value: z.enum(['NaN', 'Infinity', '-Infinity']) }),
]);

export const documentEnvelopeSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  objects: z.array(z.unknown()),
  roots: z.array(z.string().min(1)),
});

export const commandStateSchema = z.object({
  type: z.string().min(1),
  state: z.record(z.unknown()),
});

export const historySnapshotSchema = z.object({
  version: z.literal(1),
  done: z.array(z.unknown()),
  redo: z.array(z.unknown()),
});

export type ParsedObjectRecord = z.infer<typeof objectRecordSchema>;
export type ParsedTypedMarker = z.infer<typeof typedMarkerSchema>;

/**
 * Parse `input` with `schema`, turning validation failures into
 * {@link InvalidDocumentError} whose message names the first failing path.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  throw new InvalidDocumentError(
    `Invalid ${what}${where}: ${issue ? issue.message : 'validation failed'}`,
    { cause: result.error },
  );
}

/**
 * {@link parseOrThrow} for an object record. The raw `properties` object is
 * kept, since zod drops `__proto__` keys when it copies a record.
 */
export function parseObjectRecord(node: unknown, what: string): ParsedObjectRecord {
  const record = parseOrThrow(objectRecordSchema, node, what);
  if (isPlainObject(node) && isPlainObject(node.properties)) {
    return { ...record, properties: node.properties };
  }
  return record;
}
