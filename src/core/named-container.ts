import { DocbridgeError, RegistryFrozenError } from "./errors.js";

export type Named = { readonly name: string };

type ElementCallback<T> = (element: T) => void;

/**
 * A name-keyed registry mutated during configuration and sealed before execution.
 * Registering an existing name replaces the element (last write wins).
 */
export class NamedContainer<T extends Named> {
  private readonly elements = new Map<string, T>();
  private readonly callbacks: ElementCallback<T>[] = [];
  private sealed = false;

  constructor(
    readonly label: string,
    private readonly factory: (name: string) => T,
  ) {}

  get size(): number {
    return this.elements.size;
  }

  register(name: string, configure?: ElementCallback<T>): T {
    this.assertOpen(name);
    const element = this.factory(name);
    configure?.(element);
    this.elements.set(name, element);
    for (const callback of this.callbacks) {
      callback(element);
    }
    return element;
  }

  /** Adds an element built elsewhere, e.g. a subtype the factory does not create. */
  add(element: T): T {
    this.assertOpen(element.name);
    this.elements.set(element.name, element);
    for (const callback of this.callbacks) {
      callback(element);
    }
    return element;
  }

  maybeCreate(name: string, configure?: ElementCallback<T>): T {
    const existing = this.elements.get(name);
    if (!existing) {
      return this.register(name, configure);
    }
    this.assertOpen(name);
    configure?.(existing);
    return existing;
  }

  findByName(name: string): T | undefined {
    return this.elements.get(name);
  }

  getByName(name: string): T {
    const element = this.elements.get(name);
    if (!element) {
      throw new DocbridgeError(`${this.label} '${name}' not found.`);
    }
    return element;
  }

  names(): string[] {
    return Array.from(this.elements.keys());
  }

  values(): T[] {
    return Array.from(this.elements.values());
  }

  /** Runs `callback` for every current element and for every element registered later. */
  all(callback: ElementCallback<T>): void {
    this.callbacks.push(callback);
    for (const element of this.values()) {
      callback(element);
    }
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  private assertOpen(name: string): void {
    if (this.sealed) {
      throw new RegistryFrozenError(
        `${this.label} container is sealed; cannot register '${name}'.`,
      );
    }
  }
}
