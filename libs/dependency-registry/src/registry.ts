/**
 * Typed key for values that have no class of their own (functions, config objects, interfaces).
 */
export class Token<T> {
  /** Phantom member binding the token to its value type. */
  declare readonly __type?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `Token(${this.name})`;
  }
}

export function createToken<T>(name: string): Token<T> {
  return new Token<T>(name);
}

export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Lookup key. A class constructor stands for the type itself: `register(instance)`
 * without an explicit key files the instance under its constructor.
 */
export type RegistryKey<T> = string | symbol | Token<T> | Constructor<T>;

export function describeKey(key: RegistryKey<unknown>): string {
  if (typeof key === 'string') return key;
  if (typeof key === 'symbol') return key.toString();
  if (key instanceof Token) return key.toString();
  return key.name || 'anonymous class';
}

export class DependencyNotFoundError extends Error {
  readonly key: string;

  constructor(key: RegistryKey<unknown>) {
    super(`No dependency registered for ${describeKey(key)}`);
    this.name = 'DependencyNotFoundError';
    this.key = describeKey(key);
  }
}

export class DependencyTypeError extends Error {
  constructor(key: RegistryKey<unknown>) {
    super(`Dependency registered for ${describeKey(key)} is not an instance of it`);
    this.name = 'DependencyTypeError';
  }
}

type Entry = { kind: 'value'; value: unknown } | { kind: 'factory'; create: (registry: Registry) => unknown };

/**
 * Keyed singleton map used by composition roots to wire implementations to consumers.
 * Components themselves take their collaborators as constructor parameters and never
 * read from a registry.
 */
export class Registry {
  private readonly entries = new Map<unknown, Entry>();

  register<T extends object>(value: T): this;
  register<T>(value: T, key: RegistryKey<T>): this;
  register<T>(value: T, key?: RegistryKey<T>): this {
    this.entries.set(key ?? this.typeKeyOf(value), { kind: 'value', value });
    return this;
  }

  /**
   * Registers a lazily created singleton. The factory runs on first resolution and its
   * result replaces the factory.
   */
  registerFactory<T>(key: RegistryKey<T>, create: (registry: Registry) => T): this {
    this.entries.set(key, { kind: 'factory', create });
    return this;
  }

  /**
   * @throws DependencyNotFoundError when nothing is registered under `key`
   * @throws DependencyTypeError when a constructor key maps to a value of another type
   */
  resolve<T>(key: RegistryKey<T>): T {
    const entry = this.entries.get(key);
    if (!entry) {
      throw new DependencyNotFoundError(key);
    }

    let value: unknown;
    if (entry.kind === 'factory') {
      value = entry.create(this);
      this.entries.set(key, { kind: 'value', value });
    } else {
      value = entry.value;
    }
    return this.narrow(key, value);
  }

  tryResolve<T>(key: RegistryKey<T>): T | undefined {
    return this.has(key) ? this.resolve(key) : undefined;
  }

  has(key: RegistryKey<unknown>): boolean {
    return this.entries.has(key);
  }

  unregister(key: RegistryKey<unknown>): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private typeKeyOf(value: unknown): unknown {
    if (typeof value !== 'object' || value === null) {
      throw new TypeError('A key is required when registering a primitive value');
    }
    const ctor: unknown = value.constructor;
    if (typeof ctor !== 'function' || ctor === Object) {
      throw new TypeError('A key is required when registering a plain object');
    }
    return ctor;
  }

  private narrow<T>(key: RegistryKey<T>, value: unknown): T {
    if (typeof key === 'function') {
      if (value instanceof key) {
        return value;
      }
      throw new DependencyTypeError(key);
    }
    // Token, string and symbol keys carry no runtime type.
    return value as T;
  }
}
