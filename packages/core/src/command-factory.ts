/**
 * @module command-factory
 * Rebuilds commands from their serialized {@link CommandState}.
 *
 * Each command type registers a builder under the name its `toState()`
 * writes. Observable targets and values inside the state are `$ref` markers
 * resolved against an identity registry.
 */

import type {
  Command,
  CommandState,
  IdentityResolver,
  ObservableObject,
} from '@reversible/types';
import { CompoundCommand } from './commands/compound-command';
import { PropertyCommand } from './commands/property-command';
import { commandStateSchema, parseOrThrow } from './document-schema';
import { DanglingReferenceError, SerializationTypeError } from './errors';
import { decodeValue } from './value-codec';

/** Services handed to a builder while it rebuilds one command. */
export interface CommandRestoreContext {
  /**
   * The live observable with that id.
   * @throws DanglingReferenceError when nothing holds the id.
   */
  resolve(id: string): ObservableObject;
  /** Decode a serialized value, resolving `$ref` markers through {@link resolve}. */
  decode(node: unknown): unknown;
  /** Rebuild a nested command (e.g. a compound's children). */
  restore(state: unknown): Command;
}

/** Rebuilds one command type from the payload its `toState()` wrote. */
export type CommandBuilder = (state: Record<string, unknown>, context: CommandRestoreContext) => Command;

/** Registry of command builders keyed by type name. */
export class CommandFactory {
  private readonly builders = new Map<string, CommandBuilder>();

  /**
   * Register `builder` for `type`.
   * @throws Error when the type already has a builder.
   */
  register(type: string, builder: CommandBuilder): void {
    if (this.builders.has(type)) {
      throw new Error(`Command type "${type}" is already registered`);
    }
    this.builders.set(type, builder);
  }

  has(type: string): boolean {
    return this.builders.has(type);
  }

  /** Registered type names, in registration order. */
  types(): string[] {
    return [...this.builders.keys()];
  }

  /**
   * Rebuild a command from its serialized state.
   *
   * @throws InvalidDocumentError when `state` is malformed
   * @throws SerializationTypeError when the type has no builder
   * @throws DanglingReferenceError when a referenced id does not resolve
   */
  restore(state: unknown, identities: IdentityResolver<ObservableObject>): Command {
    const context: CommandRestoreContext = {
      resolve: (id) => {
        const object = identities.resolve(id);
        if (!object) throw new DanglingReferenceError(id);
        return object;
      },
      decode: (node) => decodeValue(node, { decodeRef: (id) => context.resolve(id) }),
      restore: (nested) => this.build(nested, context),
    };
    return this.build(state, context);
  }

  private build(state: unknown, context: CommandRestoreContext): Command {
    const parsed = parseOrThrow(commandStateSchema, state, 'command state');
    const builder = this.builders.get(parsed.type);
    if (!builder) {
      throw new SerializationTypeError(`No command builder registered for "${parsed.type}"`);
    }
    return builder(parsed.state, context);
  }
}

/** Factory with {@link PropertyCommand} and {@link CompoundCommand} registered. */
export function createDefaultCommandFactory(): CommandFactory {
  const factory = new CommandFactory();
  factory.register(PropertyCommand.TYPE, (state, context) => PropertyCommand.fromState(state, context));
  factory.register(CompoundCommand.TYPE, (state, context) => CompoundCommand.fromState(state, context));
  return factory;
}
