/**
 * @module serialization-registry
 * Type-name registry used to write and rebuild observables.
 *
 * @see {@link @reversible/types#SerializationRegistry} for the interface contract
 */

import type {
  ObservableObject,
  SerializationRegistry,
  TypeRegistration,
} from '@reversible/types';

/**
 * Concrete implementation of {@link SerializationRegistry}.
 *
 * `typeNameOf` looks at the instance's own constructor first and then walks
 * the prototype chain, so an unregistered subclass is written under the name
 * of its nearest registered ancestor.
 */
export class SerializationRegistryImpl implements SerializationRegistry {
  private readonly byName = new Map<string, TypeRegistration>();
  private readonly byConstructor = new Map<unknown, string>();

  /** @inheritdoc */
  registerType<T extends ObservableObject>(name: string, registration: TypeRegistration<T>): void {
    if (name.length === 0) {
      throw new Error('Type name must not be empty');
    }
    if (this.byName.has(name)) {
      throw new Error(`Type name "${name}" is already registered`);
    }
    const existing = this.byConstructor.get(registration.type);
    if (existing !== undefined) {
      throw new Error(`${registration.type.name} is already registered as "${existing}"`);
    }
    this.byName.set(name, registration);
    this.byConstructor.set(registration.type, name);
  }

  /** @inheritdoc */
  lookup(name: string): TypeRegistration | undefined {
    return this.byName.get(name);
  }

  /** @inheritdoc */
  typeNameOf(instance: ObservableObject): string | undefined {
    let proto: unknown = Object.getPrototypeOf(instance);
    while (typeof proto === 'object' && proto !== null) {
      const ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
      const name = this.byConstructor.get(ctor);
      if (name !== undefined) return name;
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }

  /** @inheritdoc */
  typeNames(): string[] {
    return [...this.byName.keys()];
  }
}
