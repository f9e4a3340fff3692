/**
 * @reversible/types
 *
 * Shared type definitions.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the contract between packages.
 *
 * @packageDocumentation
 */

// Identity
export type { Identifiable, IdentityRegistry, IdentityResolver } from './identity';

// Observables
export type {
  ObservableObject,
  PropertyChange,
  PropertyObserver,
  SubscriptionId,
} from './observable';

// Command (undo/redo)
export type {
  Command,
  CommandErrorPolicy,
  CommandHistory,
  CommandManager,
  CommandState,
  CommandStateContext,
  HistoryCapture,
  HistorySnapshot,
} from './command';

// Persisted document
export type {
  ObjectRecord,
  RefMarker,
  SerializedDocument,
  SerializedScalar,
  SerializedValue,
  TypedMarker,
  TypedMarkerName,
} from './document';

// Serialization
export type {
  DeserializedGraph,
  DeserializeOptions,
  ObservableConstructor,
  SerializationManager,
  SerializationRegistry,
  SerializeHookContext,
  SerializeOptions,
  TypeRegistration,
} from './serialization';

// Project files
export type { ProjectContents, ProjectFormat, ProjectManifest } from './project';

// Events
export type { EventBus, EventCallback, EventMap } from './events';

// Logging
export type { LogLevel, Logger } from './logger';
