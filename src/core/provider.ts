/**
 * Lazy values for configuration-phase wiring.
 * Purpose: defer computation until a value is read, and let explicit user values override
 * conventions computed from the module model.
 * Usage: new Property<boolean>("suppress").convention(isMain.map((main) => !main)).
 */

import { DocbridgeError, RegistryFrozenError } from "./errors.js";

// =============================================================================
// PROVIDER
// =============================================================================

type ProviderState<T> = { resolved: false } | { resolved: true; value: T | undefined };

/**
 * A value computed on first read and cached afterwards.
 * `undefined` from the compute function means "no value".
 * Providers derived with `map`, `flatMap`, `orElse` or `Provider.live` do not cache:
 * they re-read their source, which caches only when it was built with `new Provider`.
 */
export class Provider<T> {
  private state: ProviderState<T> = { resolved: false };

  constructor(
    private readonly compute: () => T | undefined,
    private readonly memoize: boolean = true,
  ) {}

  static of<T>(value: T): Provider<T> {
    return new Provider(() => value);
  }

  static none<T>(): Provider<T> {
    return new Provider<T>(() => undefined);
  }

  /** Evaluates `compute` on every read. */
  static live<T>(compute: () => T | undefined): Provider<T> {
    return new Provider(compute, false);
  }

  getOrNull(): T | undefined {
    if (!this.memoize) {
      return this.compute();
    }
    if (!this.state.resolved) {
      this.state = { resolved: true, value: this.compute() };
    }
    return this.state.value;
  }

  get(): T {
    const value = this.getOrNull();
    if (value === undefined) {
      throw new DocbridgeError("Provider has no value.");
    }
    return value;
  }

  isPresent(): boolean {
    return this.getOrNull() !== undefined;
  }

  map<U>(transform: (value: T) => U | undefined): Provider<U> {
    return Provider.live(() => {
      const value = this.getOrNull();
      return value === undefined ? undefined : transform(value);
    });
  }

  flatMap<U>(transform: (value: T) => Provider<U>): Provider<U> {
    return Provider.live(() => {
      const value = this.getOrNull();
      return value === undefined ? undefined : transform(value).getOrNull();
    });
  }

  orElse(fallback: T): Provider<T> {
    return Provider.live(() => this.getOrNull() ?? fallback);
  }
}

export type ValueSource<T> = T | Provider<T>;

function toProvider<T>(source: ValueSource<T>): Provider<T> {
  return source instanceof Provider ? source : Provider.of(source);
}

// =============================================================================
// PROPERTY
// =============================================================================

/**
 * Two slots: an explicit value and a convention. Reads prefer the explicit value.
 * Setting a convention never replaces an explicit value.
 */
export class Property<T> {
  private explicit: Provider<T> | undefined;
  private conventionSource: Provider<T> | undefined;
  private finalized: { value: T | undefined } | undefined;

  constructor(readonly name: string) {}

  set(source: ValueSource<T> | null | undefined): this {
    this.assertMutable();
    this.explicit = source === null || source === undefined ? undefined : toProvider(source);
    return this;
  }

  convention(source: ValueSource<T> | null | undefined): this {
    this.assertMutable();
    this.conventionSource =
      source === null || source === undefined ? undefined : toProvider(source);
    return this;
  }

  hasExplicitValue(): boolean {
    return this.explicit !== undefined;
  }

  getOrNull(): T | undefined {
    if (this.finalized) {
      return this.finalized.value;
    }
    if (this.explicit) {
      return this.explicit.getOrNull();
    }
    return this.conventionSource?.getOrNull();
  }

  get(): T {
    const value = this.getOrNull();
    if (value === undefined) {
      throw new DocbridgeError(`Property '${this.name}' has no value.`);
    }
    return value;
  }

  isPresent(): boolean {
    return this.getOrNull() !== undefined;
  }

  /** Tracks the property: every read sees its current value. */
  asProvider(): Provider<T> {
    return Provider.live(() => this.getOrNull());
  }

  /** Resolves the current value once; later reads return it and writes throw. */
  finalizeValue(): void {
    if (this.finalized) return;
    this.finalized = { value: this.getOrNull() };
  }

  isFinalized(): boolean {
    return this.finalized !== undefined;
  }

  private assertMutable(): void {
    if (this.finalized) {
      throw new RegistryFrozenError(`Property '${this.name}' is final and cannot be changed.`);
    }
  }
}
