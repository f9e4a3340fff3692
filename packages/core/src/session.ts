/**
 * @module session
 * Wires one set of registries, history and managers for an application (or a
 * test). Nothing here is a singleton: each call returns independent objects.
 */

import type {
  CommandErrorPolicy,
  EventBus,
  LogLevel,
  ObservableObject,
  SerializationRegistry,
} from '@reversible/types';
import { createDefaultCommandFactory } from './command-factory';
import type { CommandFactory } from './command-factory';
import { CommandHistoryImpl } from './command-history';
import type { CommandHistoryOptions } from './command-history';
import { CommandManagerImpl } from './command-manager';
import { EventBusImpl } from './event-bus';
import { IdentityRegistryImpl } from './identity-registry';
import { createLogger } from './logger';
import type { LogSink, LoggerOptions } from './logger';
import { SerializationManagerImpl } from './serialization-manager';
import { SerializationRegistryImpl } from './serialization-registry';

export interface SessionOptions {
  /** History depth and compression settings. */
  history?: CommandHistoryOptions;
  errorPolicy?: CommandErrorPolicy;
  /** Threshold for every logger of the session. */
  logLevel?: LogLevel;
  /** Destination for every logger of the session. */
  logSink?: LogSink;
}

/** The collaborating components of one editing session. */
export interface Session {
  readonly events: EventBus;
  readonly identities: IdentityRegistryImpl<ObservableObject>;
  readonly types: SerializationRegistry;
  readonly commandFactory: CommandFactory;
  readonly commands: CommandManagerImpl;
  readonly serializer: SerializationManagerImpl;
  /** Level and sink shared by the session's loggers, for collaborators to reuse. */
  readonly logging: LoggerOptions;
}

/**
 * Create a session.
 *
 * @example
 * const session = createSession({ history: { compression: true } });
 * session.types.registerType('Note', { type: Note, create: (id) => new Note({ id }) });
 * session.commands.execute(new PropertyCommand(note, 'title', 'Draft'));
 * const doc = session.serializer.serialize([note]);
 */
export function createSession(options: SessionOptions = {}): Session {
  const logging: LoggerOptions = { level: options.logLevel, sink: options.logSink };
  const events = new EventBusImpl(createLogger('events', logging));
  const identities = new IdentityRegistryImpl<ObservableObject>();
  const types = new SerializationRegistryImpl();
  const commandFactory = createDefaultCommandFactory();

  const commands = new CommandManagerImpl({
    history: new CommandHistoryImpl(options.history),
    events,
    logger: createLogger('commands', logging),
    errorPolicy: options.errorPolicy,
    commandFactory,
  });
  const serializer = new SerializationManagerImpl({
    registry: types,
    identities,
    logger: createLogger('serialization', logging),
  });

  return { events, identities, types, commandFactory, commands, serializer, logging };
}
