/**
 * @module command
 * Command pattern types for undo/redo support.
 * Each mutation of an observable graph is represented as a Command that can be
 * executed and reversed.
 */

import type { SerializedValue } from './document';
import type { ObservableObject } from './observable';

/** A reversible unit of work. */
export interface Command {
  /** Human-readable description of the command (for undo/redo menus). */
  readonly description: string;
  /** Apply the change. Must validate before mutating. */
  execute(): void;
  /** Reverse the change. */
  undo(): void;
  /** Re-apply after an undo. When absent, `execute()` is called instead. */
  redo?(): void;
  /**
   * Offer to absorb `next`, the command recorded right after this one.
   * Returns the merged command, or null when the two cannot be combined.
   */
  mergeWith?(next: Command): Command | null;
  /**
   * Serializable state used to rebuild the command through a command factory.
   * Values, observables included, go through `context.encode`.
   */
  toState?(context?: CommandStateContext): CommandState;
}

/** Services offered to {@link Command.toState}. */
export interface CommandStateContext {
  /** Document form of `value`; observables become `{"$ref": id}` markers. */
  encode(value: unknown, path: string): SerializedValue;
}

/** Serialized form of a command. */
export type CommandState = {
  /** Name the command type is registered under. */
  type: string;
  /** Type-specific payload. */
  state: { [key: string]: SerializedValue };
};

/** Serialized form of a whole command history. */
export interface HistorySnapshot {
  version: number;
  /** Executed commands, oldest first. */
  done: CommandState[];
  /** Undone commands, oldest undo first (the next redo is last). */
  redo: CommandState[];
}

/** A history snapshot together with the observables its commands reference. */
export interface HistoryCapture {
  snapshot: HistorySnapshot;
  /** Distinct observables written as `$ref` markers in the snapshot. */
  references: ObservableObject[];
}

/** Manages the done/redo stacks for undo/redo. */
export interface CommandHistory {
  /** Maximum number of commands kept on the done stack. */
  readonly maxDepth: number;
  /** Whether there are commands that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are commands that can be redone. */
  readonly canRedo: boolean;
  /** Description of the next command to undo, or null. */
  readonly undoDescription: string | null;
  /** Description of the next command to redo, or null. */
  readonly redoDescription: string | null;

  /**
   * Record an already-executed command. May merge it into the previous entry.
   * Clears the redo stack.
   * @returns true when the command was merged into the previous entry.
   */
  add(command: Command): boolean;
  /** Undo the most recent command; null when there is nothing to undo. */
  undo(): Command | null;
  /** Redo the most recently undone command; null when there is nothing to redo. */
  redo(): Command | null;
  /** Drop both stacks. */
  clear(): void;
  /** Read-only view of both stacks, bottom first. */
  entries(): { done: readonly Command[]; redo: readonly Command[] };
  /** Replace both stacks (history restore). */
  load(done: readonly Command[], redo: readonly Command[]): void;
}

/** How the manager surfaces errors raised by `Command.execute()`. */
export type CommandErrorPolicy = 'propagate' | 'report';

/** Coordinates command execution, history recording and execution modes. */
export interface CommandManager {
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  readonly undoDescription: string | null;
  readonly redoDescription: string | null;
  /** True while a command's execute/undo/redo is running. */
  readonly isExecuting: boolean;
  /** True while init mode is active. */
  readonly isInitializing: boolean;
  /** True while a compound batch is being collected. */
  readonly isBatching: boolean;
  /** False once an undo step failed for lack of captured state, until `clear()`. */
  readonly isHistoryReliable: boolean;

  /** Execute a command and record it. Returns false when the error was reported. */
  execute(command: Command): boolean;
  /** Undo the last recorded command. Returns false when nothing was undone. */
  undo(): boolean;
  /** Redo the last undone command. Returns false when nothing was redone. */
  redo(): boolean;
  /** Drop the history. */
  clear(): void;

  beginInit(): void;
  endInit(): void;
  beginCompound(name: string): void;
  endCompound(): void;
  /** Undo and discard the pending batch. */
  cancelCompound(): void;
}
