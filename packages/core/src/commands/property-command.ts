/**
 * @module commands/property-command
 * Generic command for changing one declared property on an observable.
 */

import type { Command, CommandState, CommandStateContext, SerializedValue } from '@reversible/types';
import { z } from 'zod';
import type { CommandRestoreContext } from '../command-factory';
import { parseOrThrow, refMarkerSchema } from '../document-schema';
import { CommandExecutionError, CommandUndoError, InvalidDocumentError } from '../errors';
import { Observable } from '../observable';
import type { PropertyName } from '../observable';
import { referenceStateContext } from '../value-codec';

const propertyStateSchema = z.object({
  target: refMarkerSchema,
  property: z.string().min(1),
  oldValue: z.unknown(),
  newValue: z.unknown(),
  description: z.string(),
});

export interface PropertyCommandOptions<T> {
  /** Label for undo/redo menus. Defaults to `Set <property>`. */
  description?: string;
  /**
   * Value to restore on undo. When omitted, the target's value at
   * construction time is captured; null records that none is known.
   */
  previous?: { value: T } | null;
}

/**
 * Sets a single property on an observable, capturing the old value for undo.
 *
 * Values are applied absolutely, so redo is a plain re-execute. Two commands
 * on the same target and property whose values chain (the first one's new
 * value equals the second one's old value) merge into one.
 *
 * @typeParam P - Property interface of the target.
 * @typeParam K - The property key being modified.
 */
export class PropertyCommand<
  P extends object = Record<string, unknown>,
  K extends PropertyName<P> = PropertyName<P>,
> implements Command
{
  /** Name this command is registered under in a command factory. */
  static readonly TYPE = 'property';

  readonly description: string;
  readonly target: Observable<P>;
  readonly property: K;
  readonly newValue: P[K];
  /** Null when the property was not declared at construction. */
  private readonly previous: { value: P[K] } | null;

  constructor(
    target: Observable<P>,
    property: K,
    newValue: P[K],
    options: PropertyCommandOptions<P[K]> = {},
  ) {
    this.target = target;
    this.property = property;
    this.newValue = newValue;
    this.description = options.description ?? `Set ${property}`;
    if (options.previous !== undefined) {
      this.previous = options.previous;
    } else {
      this.previous = target.hasProperty(property) ? { value: target.get(property) } : null;
    }
  }

  /** Value restored by undo, or undefined when none was captured. */
  get oldValue(): P[K] | undefined {
    return this.previous?.value;
  }

  /** Apply the new value. */
  execute(): void {
    if (!this.target.hasProperty(this.property)) {
      throw new CommandExecutionError(
        `"${this.property}" is not a declared property of ${this.target.constructor.name}`,
      );
    }
    this.target.set(this.property, this.newValue);
  }

  /** Restore the old value. */
  undo(): void {
    if (!this.previous) {
      throw new CommandUndoError(`No previous value of "${this.property}" was captured`);
    }
    this.target.set(this.property, this.previous.value);
  }

  /** Whether `next` chains onto this command and can be absorbed by it. */
  canMergeWith(next: Command): next is PropertyCommand<P, K> {
    return (
      next instanceof PropertyCommand &&
      next.target === this.target &&
      next.property === this.property &&
      this.previous !== null &&
      next.previous !== null &&
      this.target.hasProperty(this.property) &&
      this.target.schema[this.property].equals(this.newValue, next.previous.value)
    );
  }

  /** Combine with `next`: keeps this old value and takes the next new value. */
  mergeWith(next: Command): Command | null {
    if (!this.canMergeWith(next) || !this.previous) return null;
    return new PropertyCommand(this.target, this.property, next.newValue, {
      description: this.description,
      previous: this.previous,
    });
  }

  /** @inheritdoc */
  toState(context: CommandStateContext = referenceStateContext): CommandState {
    const state: { [key: string]: SerializedValue } = {
      target: context.encode(this.target, '$.target'),
      property: this.property,
      newValue: context.encode(this.newValue, `$.${this.property}`),
      description: this.description,
    };
    if (this.previous) {
      state.oldValue = context.encode(this.previous.value, `$.${this.property}`);
    }
    return { type: PropertyCommand.TYPE, state };
  }

  /** Rebuild a command written by {@link toState}. */
  static fromState(state: Record<string, unknown>, context: CommandRestoreContext): PropertyCommand {
    const parsed = parseOrThrow(propertyStateSchema, state, 'property command state');
    const resolved = context.resolve(parsed.target.$ref);
    if (!(resolved instanceof Observable)) {
      throw new InvalidDocumentError(`Command target "${parsed.target.$ref}" is not an observable`);
    }
    const target: Observable = resolved;
    return new PropertyCommand(target, parsed.property, context.decode(parsed.newValue), {
      description: parsed.description,
      previous: 'oldValue' in parsed ? { value: context.decode(parsed.oldValue) } : null,
    });
  }
}
