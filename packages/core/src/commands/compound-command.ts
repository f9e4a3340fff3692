/**
 * @module commands/compound-command
 * Groups several commands into a single undoable entry.
 */

import type { Command, CommandState, CommandStateContext } from '@reversible/types';
import { z } from 'zod';
import type { CommandRestoreContext } from '../command-factory';
import { parseOrThrow } from '../document-schema';
import { CommandUndoError, SerializationTypeError } from '../errors';

const compoundStateSchema = z.object({
  name: z.string(),
  commands: z.array(z.unknown()),
});

/**
 * Runs its children in order and undoes them in reverse.
 *
 * Execution is all-or-nothing: when a child throws, the children that already
 * ran are undone in reverse and the original error is re-thrown.
 */
export class CompoundCommand implements Command {
  static readonly TYPE = 'compound';

  readonly name: string;
  private readonly children: Command[];

  constructor(name: string, commands: readonly Command[] = []) {
    this.name = name;
    this.children = [...commands];
  }

  get description(): string {
    return this.name;
  }

  /** Children in execution order. */
  get commands(): readonly Command[] {
    return this.children;
  }

  /** Append a child that has already been executed by the caller. */
  add(command: Command): void {
    this.children.push(command);
  }

  isEmpty(): boolean {
    return this.children.length === 0;
  }

  execute(): void {
    this.runForward((command) => command.execute());
  }

  undo(): void {
    for (let i = this.children.length - 1; i >= 0; i--) {
      this.children[i].undo();
    }
  }

  redo(): void {
    this.runForward((command) => (command.redo ? command.redo() : command.execute()));
  }

  /** @inheritdoc */
  toState(context?: CommandStateContext): CommandState {
    return {
      type: CompoundCommand.TYPE,
      state: {
        name: this.name,
        commands: this.children.map((command) => {
          if (!command.toState) {
            throw new SerializationTypeError(`Command "${command.description}" has no serializable state`);
          }
          return command.toState(context);
        }),
      },
    };
  }

  /** Rebuild a compound written by {@link toState}. */
  static fromState(state: Record<string, unknown>, context: CommandRestoreContext): CompoundCommand {
    const parsed = parseOrThrow(compoundStateSchema, state, 'compound command state');
    return new CompoundCommand(
      parsed.name,
      parsed.commands.map((child) => context.restore(child)),
    );
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private runForward(step: (command: Command) => void): void {
    const applied: Command[] = [];
    for (const command of this.children) {
      try {
        step(command);
      } catch (error) {
        this.rollBack(applied, error);
        throw error;
      }
      applied.push(command);
    }
  }

  private rollBack(applied: readonly Command[], failure: unknown): void {
    for (let i = applied.length - 1; i >= 0; i--) {
      try {
        applied[i].undo();
      } catch (rollbackError) {
        throw new CommandUndoError(
          `Rolling back "${this.name}" failed at "${applied[i].description}"`,
          { cause: new AggregateError([failure, rollbackError]) },
        );
      }
    }
  }
}
