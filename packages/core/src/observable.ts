/**
 * @module observable
 * Observable base class: typed property slots with change notification.
 *
 * A concrete type declares its property values as an interface and a schema
 * object shared by every instance:
 *
 * @example
 * interface NoteProps { title: string; tags: string[] }
 * const noteSchema: Schema<NoteProps> = {
 *   title: property('Untitled'),
 *   tags: property<string[]>([]),
 * };
 * class Note extends Observable<NoteProps> {
 *   constructor(options?: ObservableOptions) {
 *     super(noteSchema, options);
 *   }
 * }
 *
 * Notification runs once per logical write. While observers of a property are
 * being notified, a nested write to the same property on the same instance is
 * stored but not re-notified, which breaks cycles between two-way bindings.
 */

import type {
  Logger,
  ObservableObject,
  PropertyChange,
  PropertyObserver,
  SubscriptionId,
} from '@reversible/types';
import { isPlainObject, valueEquals } from './equality';
import { UnknownPropertyError } from './errors';
import { createLogger } from './logger';
import { createSequence, generateId } from './uuid';

export interface PropertyOptions<T> {
  /** Decides whether a write is a change. Defaults to {@link valueEquals}. */
  equals?(a: T, b: T): boolean;
}

/** Declaration of one property: its default value and its equality rule. */
export class ObservableProperty<T> {
  readonly defaultValue: T;
  private readonly options: PropertyOptions<T>;

  constructor(defaultValue: T, options: PropertyOptions<T> = {}) {
    this.defaultValue = defaultValue;
    this.options = options;
  }

  equals(a: T, b: T): boolean {
    return this.options.equals ? this.options.equals(a, b) : valueEquals(a, b);
  }
}

/** Shorthand for `new ObservableProperty(defaultValue, options)`. */
export function property<T>(defaultValue: T, options?: PropertyOptions<T>): ObservableProperty<T> {
  return new ObservableProperty(defaultValue, options);
}

/** Property declarations for the value interface `P`. */
export type Schema<P> = { readonly [K in keyof P]-?: ObservableProperty<P[K]> };

/** Property names of `P` usable with `get`/`set`. */
export type PropertyName<P> = keyof P & string;

export interface ObservableOptions {
  /** Identifier to restore. A new UUID is generated when omitted. */
  id?: string;
  /** Receives reports of failing observers. */
  logger?: Logger;
}

type Box<T> = { value: T };

type NotificationState =
  | { phase: 'idle' }
  | { phase: 'notifying'; properties: readonly string[] };

const nextSubscriptionId = createSequence('sub');
const defaultLogger = createLogger('observable');
const hasOwn = (target: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(target, key);

/**
 * Base class for objects whose declared properties emit change notifications.
 *
 * @typeParam P - Interface of property names to value types.
 */
export class Observable<P extends object = Record<string, unknown>> implements ObservableObject {
  /** Stable identifier; immutable once assigned. */
  readonly id: string;
  /** Property declarations shared by every instance of the concrete type. */
  readonly schema: Schema<P>;

  private readonly declared: Readonly<Record<string, ObservableProperty<unknown>>>;
  private readonly values: { [K in keyof P]?: Box<P[K]> } = {};
  private readonly valuesByName: Record<string, Box<unknown> | undefined>;
  private readonly observers = new Map<string, Map<SubscriptionId, PropertyObserver>>();
  private readonly logger: Logger;
  private state: NotificationState = { phase: 'idle' };

  constructor(schema: Schema<P>, options: ObservableOptions = {}) {
    this.id = options.id ?? generateId();
    this.schema = schema;
    this.declared = schema;
    this.valuesByName = this.values;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Current value. Before the first write this is the instance's own shallow
   * copy of the declared default, so mutating a default array, map, set,
   * date or plain object does not leak into other instances.
   */
  get<K extends PropertyName<P>>(name: K): P[K] {
    this.slot(name);
    const box = this.values[name];
    return box ? box.value : this.schema[name].defaultValue;
  }

  /** Write a value; observers run only when it differs from the current one. */
  set<K extends PropertyName<P>>(name: K, value: P[K]): void {
    this.setProperty(name, value);
  }

  /** Subscribe to changes of `name`. */
  addObserver<K extends PropertyName<P>>(
    name: K,
    callback: PropertyObserver<P[K]>,
  ): SubscriptionId {
    return this.observeProperty(name, callback as PropertyObserver);
  }

  /** @inheritdoc */
  propertyNames(): readonly string[] {
    return Object.keys(this.declared);
  }

  /** @inheritdoc */
  hasProperty(name: string): boolean {
    return hasOwn(this.declared, name);
  }

  /** @inheritdoc */
  getProperty(name: string): unknown {
    return this.slot(name).value;
  }

  /** @inheritdoc */
  setProperty(name: string, value: unknown): void {
    const declaration = this.declaration(name);
    const oldValue = this.getProperty(name);
    if (declaration.equals(oldValue, value)) return;

    this.valuesByName[name] = { value };
    this.notify(name, oldValue, value);
  }

  /** @inheritdoc */
  observeProperty(name: string, callback: PropertyObserver): SubscriptionId {
    this.assertDeclared(name);
    let subscribers = this.observers.get(name);
    if (!subscribers) {
      subscribers = new Map();
      this.observers.set(name, subscribers);
    }
    const subscription = nextSubscriptionId();
    subscribers.set(subscription, callback);
    return subscription;
  }

  /** @inheritdoc */
  removeObserver(name: string, subscription: SubscriptionId): void {
    this.assertDeclared(name);
    const subscribers = this.observers.get(name);
    if (!subscribers) return;
    subscribers.delete(subscription);
    if (subscribers.size === 0) {
      this.observers.delete(name);
    }
  }

  /** Number of live subscriptions on `name`. */
  observerCount(name: string): number {
    return this.observers.get(name)?.size ?? 0;
  }

  /** Whether observers of `name` (or of any property) are currently running. */
  isNotifying(name?: string): boolean {
    if (this.state.phase === 'idle') return false;
    return name === undefined || this.state.properties.includes(name);
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private notify(name: string, oldValue: unknown, newValue: unknown): void {
    const previous = this.state;
    if (previous.phase === 'notifying' && previous.properties.includes(name)) {
      this.logger.debug(`Nested write to "${name}" on ${this.id} stored without notification`);
      return;
    }

    const subscribers = this.observers.get(name);
    if (!subscribers) return;

    const change: PropertyChange = { property: name, oldValue, newValue, source: this };
    this.state = {
      phase: 'notifying',
      properties: previous.phase === 'idle' ? [name] : [...previous.properties, name],
    };
    try {
      // Snapshot: subscriptions added or removed by a callback apply to the next write.
      for (const callback of [...subscribers.values()]) {
        try {
          callback(change);
        } catch (error) {
          this.logger.error(`Observer of "${name}" on ${this.id} threw`, error);
        }
      }
    } finally {
      this.state = previous;
    }
  }

  /** Stored box of `name`, taking a copy of the default on first access. */
  private slot(name: string): Box<unknown> {
    const declaration = this.declaration(name);
    const existing = hasOwn(this.valuesByName, name) ? this.valuesByName[name] : undefined;
    if (existing) return existing;
    const box = { value: copyDefault(declaration.defaultValue) };
    this.valuesByName[name] = box;
    return box;
  }

  private declaration(name: string): ObservableProperty<unknown> {
    this.assertDeclared(name);
    return this.declared[name];
  }

  private assertDeclared(name: string): void {
    if (!hasOwn(this.declared, name)) {
      throw new UnknownPropertyError(name, this.constructor.name);
    }
  }
}

function copyDefault(value: unknown): unknown {
  if (Array.isArray(value)) return [...value];
  if (value instanceof Map) return new Map(value);
  if (value instanceof Set) return new Set(value);
  if (value instanceof Date) return new Date(value.getTime());
  if (isPlainObject(value)) return { ...value };
  return value;
}
