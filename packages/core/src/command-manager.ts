/**
 * @module command-manager
 * Coordinates command execution, history recording and the init/batch modes.
 *
 * @see {@link @reversible/types#CommandManager} for the interface contract
 */

import type {
  Command,
  CommandErrorPolicy,
  CommandHistory,
  CommandManager,
  CommandState,
  CommandStateContext,
  EventBus,
  HistoryCapture,
  HistorySnapshot,
  IdentityResolver,
  Logger,
  ObservableObject,
} from '@reversible/types';
import { CommandHistoryImpl } from './command-history';
import { createDefaultCommandFactory } from './command-factory';
import type { CommandFactory } from './command-factory';
import { CompoundCommand } from './commands/compound-command';
import { historySnapshotSchema, parseOrThrow } from './document-schema';
import {
  CommandModeError,
  CommandUndoError,
  ReentrantExecutionError,
  SerializationTypeError,
  describeError,
} from './errors';
import { EventBusImpl } from './event-bus';
import { createLogger } from './logger';
import { encodeValue } from './value-codec';
import type { EncodeHooks } from './value-codec';

/** Version written into history snapshots. */
export const HISTORY_SNAPSHOT_VERSION = 1;

export interface CommandManagerOptions {
  /** Defaults to a {@link CommandHistoryImpl} with default options. */
  history?: CommandHistory;
  /** Receives lifecycle events. Defaults to a private {@link EventBusImpl}. */
  events?: EventBus;
  logger?: Logger;
  /** How failures of `execute` reach the caller (default `'propagate'`). */
  errorPolicy?: CommandErrorPolicy;
  /** Rebuilds commands in {@link CommandManagerImpl.restoreHistory}. */
  commandFactory?: CommandFactory;
}

/**
 * Concrete implementation of {@link CommandManager}.
 *
 * - Normal mode: an executed command is added to the history.
 * - Init mode: commands execute but are not recorded.
 * - Batch mode: executed commands collect in a pending {@link CompoundCommand}
 *   that the outermost `endCompound()` records as one entry.
 *
 * Modes nest by depth; init and batch cannot be active together. While a
 * command's `execute`, `undo` or `redo` runs, and while `command:executing`
 * listeners run, any call that moves history or changes the mode fails with
 * {@link ReentrantExecutionError}.
 */
export class CommandManagerImpl implements CommandManager {
  readonly history: CommandHistory;
  readonly events: EventBus;

  private readonly logger: Logger;
  private readonly errorPolicy: CommandErrorPolicy;
  private readonly commandFactory: CommandFactory;

  private running = false;
  private reliable = true;
  private initDepth = 0;
  private batchDepth = 0;
  private batch: CompoundCommand | null = null;

  constructor(options: CommandManagerOptions = {}) {
    this.history = options.history ?? new CommandHistoryImpl();
    this.events = options.events ?? new EventBusImpl();
    this.logger = options.logger ?? createLogger('commands');
    this.errorPolicy = options.errorPolicy ?? 'propagate';
    this.commandFactory = options.commandFactory ?? createDefaultCommandFactory();
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.history.canUndo;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.history.canRedo;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    return this.history.undoDescription;
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    return this.history.redoDescription;
  }

  /** @inheritdoc */
  get isExecuting(): boolean {
    return this.running;
  }

  /** @inheritdoc */
  get isInitializing(): boolean {
    return this.initDepth > 0;
  }

  /** @inheritdoc */
  get isBatching(): boolean {
    return this.batchDepth > 0;
  }

  /** @inheritdoc */
  get isHistoryReliable(): boolean {
    return this.reliable;
  }

  /** @inheritdoc */
  execute(command: Command): boolean {
    this.assertNotRunning('execute');
    try {
      this.run(() => {
        this.events.emit('command:executing', { command });
        command.execute();
      });
    } catch (error) {
      this.events.emit('command:executed', { command, success: false });
      if (error instanceof CommandUndoError) this.markUnreliable(error);
      if (this.errorPolicy === 'report') {
        this.logger.error(`"${command.description}" failed: ${describeError(error)}`, error);
        return false;
      }
      throw error;
    }
    this.events.emit('command:executed', { command, success: true });
    this.record(command);
    return true;
  }

  /** @inheritdoc */
  undo(): boolean {
    this.assertNotRunning('undo');
    this.assertNoBatch('undo');
    const command = this.step(() => this.history.undo());
    if (!command) return false;
    this.events.emit('history:undone', { description: command.description });
    return true;
  }

  /** @inheritdoc */
  redo(): boolean {
    this.assertNotRunning('redo');
    this.assertNoBatch('redo');
    const command = this.step(() => this.history.redo());
    if (!command) return false;
    this.events.emit('history:redone', { description: command.description });
    return true;
  }

  /** @inheritdoc */
  clear(): void {
    this.assertNotRunning('clear');
    this.history.clear();
    this.reliable = true;
    this.events.emit('history:cleared');
  }

  /** @inheritdoc */
  beginInit(): void {
    this.assertNotRunning('beginInit');
    if (this.batchDepth > 0) {
      throw new CommandModeError('Cannot begin init mode while a batch is pending');
    }
    this.initDepth += 1;
  }

  /** @inheritdoc */
  endInit(): void {
    this.assertNotRunning('endInit');
    if (this.initDepth === 0) {
      throw new CommandModeError('endInit() without a matching beginInit()');
    }
    this.initDepth -= 1;
  }

  /** @inheritdoc */
  beginCompound(name: string): void {
    this.assertNotRunning('beginCompound');
    if (this.initDepth > 0) {
      throw new CommandModeError('Cannot begin a batch while init mode is active');
    }
    if (this.batchDepth === 0) {
      this.batch = new CompoundCommand(name);
    }
    this.batchDepth += 1;
  }

  /** @inheritdoc */
  endCompound(): void {
    this.assertNotRunning('endCompound');
    const batch = this.batch;
    if (this.batchDepth === 0 || !batch) {
      throw new CommandModeError('endCompound() without a matching beginCompound()');
    }
    this.batchDepth -= 1;
    if (this.batchDepth > 0) return;

    this.batch = null;
    if (batch.isEmpty()) {
      this.logger.debug(`Dropping empty batch "${batch.name}"`);
      return;
    }
    this.push(batch);
  }

  /** @inheritdoc */
  cancelCompound(): void {
    this.assertNotRunning('cancelCompound');
    const batch = this.batch;
    if (this.batchDepth === 0 || !batch) {
      throw new CommandModeError('cancelCompound() without a pending batch');
    }
    this.batchDepth = 0;
    this.batch = null;
    try {
      this.run(() => batch.undo());
    } catch (error) {
      this.markUnreliable(error);
      throw error;
    }
  }

  /**
   * Serializable form of both history stacks.
   * @throws SerializationTypeError when a recorded command has no `toState()`
   */
  snapshotHistory(): HistorySnapshot {
    return this.captureHistory().snapshot;
  }

  /**
   * {@link snapshotHistory}, together with every observable the snapshot
   * refers to. Persisting those objects with the graph keeps the history
   * restorable when some of them are no longer reachable from the roots.
   * @throws SerializationTypeError when a recorded command has no `toState()`
   */
  captureHistory(): HistoryCapture {
    const references = new Map<string, ObservableObject>();
    const hooks: EncodeHooks = {
      encodeObservable: (object) => {
        references.set(object.id, object);
        return { $ref: object.id };
      },
    };
    const context: CommandStateContext = {
      encode: (value, path) => encodeValue(value, hooks, path),
    };
    const stateOf = (command: Command): CommandState => {
      if (!command.toState) {
        throw new SerializationTypeError(`Command "${command.description}" has no serializable state`);
      }
      return command.toState(context);
    };

    const { done, redo } = this.history.entries();
    const snapshot: HistorySnapshot = {
      version: HISTORY_SNAPSHOT_VERSION,
      done: done.map(stateOf),
      redo: redo.map(stateOf),
    };
    return { snapshot, references: [...references.values()] };
  }

  /**
   * Replace the history with commands rebuilt from `snapshot`. References are
   * resolved through `identities` (a registry, or the objects of a freshly
   * loaded graph), so the graph must be loaded first.
   * Nothing changes when any command fails to rebuild.
   */
  restoreHistory(snapshot: unknown, identities: IdentityResolver<ObservableObject>): void {
    this.assertNotRunning('restoreHistory');
    this.assertNoBatch('restoreHistory');
    const parsed = parseOrThrow(historySnapshotSchema, snapshot, 'history snapshot');
    const done = parsed.done.map((state) => this.commandFactory.restore(state, identities));
    const redo = parsed.redo.map((state) => this.commandFactory.restore(state, identities));
    this.history.load(done, redo);
    this.reliable = true;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private record(command: Command): void {
    if (this.initDepth > 0) {
      this.logger.debug(`Init mode: "${command.description}" not recorded`);
      return;
    }
    if (this.batch) {
      this.batch.add(command);
      return;
    }
    this.push(command);
  }

  private push(command: Command): void {
    const merged = this.history.add(command);
    this.events.emit('history:pushed', {
      description: this.history.undoDescription ?? command.description,
      merged,
    });
  }

  private step(move: () => Command | null): Command | null {
    try {
      return this.run(move);
    } catch (error) {
      if (error instanceof CommandUndoError) this.markUnreliable(error);
      throw error;
    }
  }

  private run<T>(fn: () => T): T {
    this.running = true;
    try {
      return fn();
    } finally {
      this.running = false;
    }
  }

  private markUnreliable(error: unknown): void {
    if (!this.reliable) return;
    this.reliable = false;
    this.logger.warn(`History is no longer reliable: ${describeError(error)}`);
  }

  private assertNotRunning(operation: string): void {
    if (this.running) {
      throw new ReentrantExecutionError(`${operation}() called while a command is running`);
    }
  }

  private assertNoBatch(operation: string): void {
    if (this.batchDepth > 0) {
      throw new CommandModeError(`${operation}() is not allowed while a batch is pending`);
    }
  }
}
