import { Lookup, NOT_FOUND, found } from "./registry";
import { hasOwn } from "./utils";

/**
 * Somewhere bindings can be placed. Registered namespaces and module
 * namespaces are `Namespace`s, a caller's own scope can be anything that can
 * hold names.
 */
export interface Scope {
  readonly name: string | null;
  has(name: string): boolean;
  get(name: string): Lookup;
  set(name: string, value: unknown): void;
  names(): string[];
}

export class Namespace implements Scope {
  private bindings: Map<string, unknown> = new Map();

  public constructor(public readonly name: string | null = null, entries: Iterable<[string, unknown]> = []) {
    for (let [key, value] of entries) {
      this.bindings.set(key, value);
    }
  }

  public get size(): number {
    return this.bindings.size;
  }

  public has(name: string): boolean {
    return this.bindings.has(name);
  }

  public get(name: string): Lookup {
    return this.bindings.has(name) ? found(this.bindings.get(name)) : NOT_FOUND;
  }

  public set(name: string, value: unknown): void {
    this.bindings.set(name, value);
  }

  public names(): string[] {
    return Array.from(this.bindings.keys());
  }

  public entries(): [string, unknown][] {
    return Array.from(this.bindings.entries());
  }

  public toJSON(): object {
    return {
      name: this.name,
      names: this.names(),
    };
  }
}

// Lets a plain object, such as a script's global object, act as a scope.
export class ObjectScope implements Scope {
  public readonly name: string | null = null;

  public constructor(private readonly target: Record<string, unknown>) {
  }

  public has(name: string): boolean {
    return hasOwn(this.target, name);
  }

  public get(name: string): Lookup {
    return this.has(name) ? found(this.target[name]) : NOT_FOUND;
  }

  public set(name: string, value: unknown): void {
    this.target[name] = value;
  }

  public names(): string[] {
    return Object.keys(this.target);
  }
}
