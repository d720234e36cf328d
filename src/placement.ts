import { SearchChain } from "./chain";
import { DuplicateLocalNameError } from "./errors";
import { Scope } from "./namespace";
import { NameRequest, PlacementMode } from "./statement";

export type Destination =
  { mode: PlacementMode.Here; scope: Scope } |
  { mode: PlacementMode.Into; name: string };

export interface Binding {
  readonly localName: string;
  readonly value: unknown;
}

// Two different exports asking for the same local name is an error, asking
// for the same pair twice is not.
export function checkLocalNames(requests: NameRequest[]): void {
  let seen: Map<string, string> = new Map();
  for (let request of requests) {
    let previous = seen.get(request.localName);
    if (previous === undefined) {
      seen.set(request.localName, request.exportedName);
    } else if (previous != request.exportedName) {
      throw new DuplicateLocalNameError(request.localName, [previous, request.exportedName]);
    }
  }
}

/**
 * Writes the bindings into their destination, later bindings replacing
 * earlier ones of the same name. Nothing outside the destination is touched.
 */
export function place(bindings: Binding[], destination: Destination, chain: SearchChain): Scope {
  let scope = destination.mode == PlacementMode.Here ? destination.scope : chain.attach(destination.name);
  for (let binding of bindings) {
    scope.set(binding.localName, binding.value);
  }
  return scope;
}
