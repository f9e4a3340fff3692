/**
 * @reversible/core
 *
 * Observable properties, reversible commands, history, and two-phase
 * serialization of object graphs.
 *
 * @packageDocumentation
 */

// Identifiers
export { generateId, createSequence } from './uuid';

// Errors
export {
  ReversibleError,
  CommandExecutionError,
  CommandUndoError,
  CommandModeError,
  ReentrantExecutionError,
  UnknownPropertyError,
  IdentityConflictError,
  SerializationTypeError,
  DanglingReferenceError,
  InvalidDocumentError,
  ProjectFileError,
  isReversibleError,
  describeError,
} from './errors';
export type { ReversibleErrorCode } from './errors';

// Logging
export { createLogger, levelFromEnv, silentLogger, DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from './logger';
export type { LogSink, LoggerOptions } from './logger';

// Observable properties
export { Observable, ObservableProperty, property } from './observable';
export type { ObservableOptions, PropertyName, PropertyOptions, Schema } from './observable';
export { valueEquals, isPlainObject } from './equality';

// Commands
export { PropertyCommand, CompoundCommand } from './commands';
export type { PropertyCommandOptions } from './commands';
export { CommandFactory, createDefaultCommandFactory } from './command-factory';
export type { CommandBuilder, CommandRestoreContext } from './command-factory';

// Command history (undo/redo)
export {
  CommandHistoryImpl,
  DEFAULT_MAX_DEPTH,
  DEFAULT_COMPRESSION_WINDOW_MS,
} from './command-history';
export type { CommandHistoryOptions } from './command-history';
export { CommandManagerImpl, HISTORY_SNAPSHOT_VERSION } from './command-manager';
export type { CommandManagerOptions } from './command-manager';

// Event bus
export { EventBusImpl } from './event-bus';

// Identity and serialization
export { IdentityRegistryImpl } from './identity-registry';
export { SerializationRegistryImpl } from './serialization-registry';
export { SerializationManagerImpl } from './serialization-manager';
export type { SerializationManagerOptions } from './serialization-manager';
export { DOCUMENT_VERSION, parseOrThrow } from './document-schema';
export { encodeValue, decodeValue, referenceEncoding } from './value-codec';
export type { DecodeHooks, EncodeHooks } from './value-codec';

// Session wiring
export { createSession } from './session';
export type { Session, SessionOptions } from './session';
