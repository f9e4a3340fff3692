/**
 * @module command-history
 * CommandHistory implementation for undo/redo support.
 * Manages a stack of reversible commands with configurable max depth and
 * optional compression of adjacent commands.
 *
 * @see {@link @reversible/types#CommandHistory} for the interface contract
 */

import type { Command, CommandHistory } from '@reversible/types';

/** Default maximum number of commands retained in history. */
export const DEFAULT_MAX_DEPTH = 100;

/** Default time window within which adjacent commands may be compressed. */
export const DEFAULT_COMPRESSION_WINDOW_MS = 1000;

export interface CommandHistoryOptions {
  /** Maximum number of commands to keep (default 100). */
  maxDepth?: number;
  /** Merge adjacent compatible commands into one entry (default false). */
  compression?: boolean;
  /** Maximum gap between two merged adds, in milliseconds (default 1000). */
  compressionWindowMs?: number;
  /** Clock used to time adds. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * Concrete implementation of {@link CommandHistory}.
 *
 * Maintains separate undo and redo stacks. Adding a new command clears the
 * redo stack. When the undo stack exceeds `maxDepth`, the oldest command is
 * discarded.
 *
 * With compression enabled, a command is merged into the top of the undo
 * stack when all of the following hold:
 * - the redo stack is empty,
 * - the top entry was the last thing added, with no undo, redo, clear or
 *   load since,
 * - it was added at most `compressionWindowMs` ago,
 * - the top entry's `mergeWith(next)` returns a command.
 */
export class CommandHistoryImpl implements CommandHistory {
  /** @inheritdoc */
  readonly maxDepth: number;

  private readonly compression: boolean;
  private readonly compressionWindowMs: number;
  private readonly now: () => number;

  private undoStack: Command[] = [];
  private redoStack: Command[] = [];
  /** The entry a following add may merge into; null once sealed. */
  private lastAdded: { command: Command; at: number } | null = null;

  constructor(options: CommandHistoryOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError('maxDepth must be an integer of at least 1');
    }
    const windowMs = options.compressionWindowMs ?? DEFAULT_COMPRESSION_WINDOW_MS;
    if (windowMs < 0) {
      throw new RangeError('compressionWindowMs must not be negative');
    }
    this.maxDepth = maxDepth;
    this.compression = options.compression ?? false;
    this.compressionWindowMs = windowMs;
    this.now = options.now ?? Date.now;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    const top = this.undoStack[this.undoStack.length - 1];
    return top ? top.description : null;
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    const top = this.redoStack[this.redoStack.length - 1];
    return top ? top.description : null;
  }

  /** @inheritdoc */
  add(command: Command): boolean {
    const at = this.now();
    const merged = this.tryMerge(command, at);
    this.redoStack = [];
    if (merged) {
      this.undoStack[this.undoStack.length - 1] = merged;
      this.lastAdded = { command: merged, at };
      return true;
    }

    this.undoStack.push(command);
    this.lastAdded = { command, at };

    // Evict oldest command if over max depth
    if (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
    return false;
  }

  /** @inheritdoc */
  undo(): Command | null {
    const command = this.undoStack.pop();
    if (!command) {
      return null;
    }
    this.lastAdded = null;
    try {
      command.undo();
    } catch (error) {
      this.undoStack.push(command);
      throw error;
    }
    this.redoStack.push(command);
    return command;
  }

  /** @inheritdoc */
  redo(): Command | null {
    const command = this.redoStack.pop();
    if (!command) {
      return null;
    }
    this.lastAdded = null;
    try {
      if (command.redo) {
        command.redo();
      } else {
        command.execute();
      }
    } catch (error) {
      this.redoStack.push(command);
      throw error;
    }
    this.undoStack.push(command);
    return command;
  }

  /** @inheritdoc */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.lastAdded = null;
  }

  /** @inheritdoc */
  entries(): { done: readonly Command[]; redo: readonly Command[] } {
    return { done: [...this.undoStack], redo: [...this.redoStack] };
  }

  /** @inheritdoc */
  load(done: readonly Command[], redo: readonly Command[]): void {
    this.undoStack = done.slice(-this.maxDepth);
    this.redoStack = [...redo];
    this.lastAdded = null;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private tryMerge(next: Command, at: number): Command | null {
    if (!this.compression || this.redoStack.length > 0 || !this.lastAdded) return null;
    const top = this.undoStack[this.undoStack.length - 1];
    if (!top || top !== this.lastAdded.command || !top.mergeWith) return null;
    if (at - this.lastAdded.at > this.compressionWindowMs) return null;
    return top.mergeWith(next);
  }
}
