import { internalError } from "./assert";
import { Namespace } from "./namespace";
import { Lookup, NOT_FOUND } from "./registry";

/**
 * The ordered list of registered namespaces a host consults for unqualified
 * names. A namespace is inserted once and then mutated in place, so its
 * position relative to the others never changes.
 */
export class SearchChain {
  private namespaces: Namespace[] = [];

  public get length(): number {
    return this.namespaces.length;
  }

  public get(name: string): Namespace | null {
    return this.namespaces.find((namespace: Namespace): boolean => namespace.name == name) || null;
  }

  public has(name: string): boolean {
    return this.get(name) !== null;
  }

  // Front to back.
  public names(): string[] {
    return this.namespaces.map((namespace: Namespace): string => namespace.name || "");
  }

  public attach(name: string): Namespace {
    let existing = this.get(name);
    if (existing) {
      return existing;
    }

    let namespace = new Namespace(name);
    this.namespaces.unshift(namespace);

    /* istanbul ignore if: We should be unable to trigger assertions in tests. */
    if (this.namespaces.filter((ns: Namespace): boolean => ns.name == name).length != 1) {
      internalError(`Namespace ${name} is registered more than once.`);
    }

    return namespace;
  }

  public detach(name: string): boolean {
    let index = this.namespaces.findIndex((namespace: Namespace): boolean => namespace.name == name);
    if (index < 0) {
      return false;
    }

    this.namespaces.splice(index, 1);
    return true;
  }

  public lookup(name: string): Lookup {
    for (let namespace of this.namespaces) {
      let result = namespace.get(name);
      if (result.found) {
        return result;
      }
    }
    return NOT_FOUND;
  }
}
