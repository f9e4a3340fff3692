/**
 * @module errors
 * Error taxonomy for commands, history and serialization.
 *
 * Every error carries a stable `code` so callers (and the UI layer outside
 * this package) can branch without `instanceof` across bundle boundaries.
 */

/** Stable machine-readable error codes. */
export type ReversibleErrorCode =
  | 'COMMAND_EXECUTION'
  | 'COMMAND_UNDO'
  | 'COMMAND_MODE'
  | 'REENTRANT_EXECUTION'
  | 'UNKNOWN_PROPERTY'
  | 'IDENTITY_CONFLICT'
  | 'SERIALIZATION_TYPE'
  | 'DANGLING_REFERENCE'
  | 'INVALID_DOCUMENT'
  | 'PROJECT_FILE';

/** Base class of every error raised by this library. */
export class ReversibleError extends Error {
  readonly code: ReversibleErrorCode;

  constructor(code: ReversibleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A command's preconditions failed before it mutated anything. Safe to discard. */
export class CommandExecutionError extends ReversibleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMMAND_EXECUTION', message, options);
  }
}

/** A command could not be undone. History past this point is unreliable. */
export class CommandUndoError extends ReversibleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMMAND_UNDO', message, options);
  }
}

/** A manager mode was entered, left or used out of order. */
export class CommandModeError extends ReversibleError {
  constructor(message: string) {
    super('COMMAND_MODE', message);
  }
}

/** `execute`/`undo`/`redo` was called from inside a running command. */
export class ReentrantExecutionError extends ReversibleError {
  constructor(message: string) {
    super('REENTRANT_EXECUTION', message);
  }
}

/** A property name is not declared on the observable's schema. */
export class UnknownPropertyError extends ReversibleError {
  readonly property: string;

  constructor(property: string, typeName: string) {
    super('UNKNOWN_PROPERTY', `"${property}" is not a declared property of ${typeName}`);
    this.property = property;
  }
}

/** Two distinct live objects claim the same id. */
export class IdentityConflictError extends ReversibleError {
  readonly id: string;

  constructor(id: string) {
    super('IDENTITY_CONFLICT', `Another live object is already registered under id "${id}"`);
    this.id = id;
  }
}

/** A type name is unknown, or a value has no serializable form. */
export class SerializationTypeError extends ReversibleError {
  constructor(message: string) {
    super('SERIALIZATION_TYPE', message);
  }
}

/** A `$ref` does not match any object record. */
export class DanglingReferenceError extends ReversibleError {
  readonly id: string;

  constructor(id: string) {
    super('DANGLING_REFERENCE', `Reference "${id}" does not resolve to any object record`);
    this.id = id;
  }
}

/** The input is not a well-formed document. */
export class InvalidDocumentError extends ReversibleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_DOCUMENT', message, options);
  }
}

/** A project file could not be read or written. */
export class ProjectFileError extends ReversibleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROJECT_FILE', message, options);
  }
}

/** Narrow an unknown thrown value to a library error. */
export function isReversibleError(error: unknown): error is ReversibleError {
  return error instanceof ReversibleError;
}

/** Render any thrown value as a message string. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
