import { NameNotExportedError, NameNotFoundInModuleError } from "./errors";
import { Namespace } from "./namespace";
import { Lookup, PackageRegistry } from "./registry";
import { FileSource, PackageSource, Source } from "./source";
import { NameRequest } from "./statement";

export interface ResolvedBinding {
  readonly exportedName: string;
  readonly localName: string;
  readonly value: unknown;
}

/**
 * What a source makes available once it has been opened: a package's export
 * table or an evaluated module's namespace.
 */
export interface ExportTable {
  readonly source: Source;
  names(): string[];
  lookup(name: string): Lookup;
  missing(names: string[]): Error;
}

export class PackageExportTable implements ExportTable {
  public constructor(
    public readonly source: PackageSource,
    private readonly registry: PackageRegistry,
    public readonly directory: string,
  ) {
  }

  public names(): string[] {
    return this.registry.listExports(this.source.identifier, this.directory);
  }

  public lookup(name: string): Lookup {
    return this.registry.getExport(this.source.identifier, name, this.directory);
  }

  public missing(names: string[]): Error {
    return new NameNotExportedError(this.source, names);
  }
}

export class ModuleExportTable implements ExportTable {
  public constructor(public readonly source: FileSource, private readonly namespace: Namespace) {
  }

  public names(): string[] {
    return this.namespace.names();
  }

  public lookup(name: string): Lookup {
    return this.namespace.get(name);
  }

  public missing(names: string[]): Error {
    return new NameNotFoundInModuleError(this.source.path, names);
  }
}

/**
 * With `.all` every export is requested under its own name, except where an
 * explicit request already covers it or it is excluded.
 */
export function expandRequests(table: ExportTable, requests: NameRequest[], all: boolean, except: string[]): NameRequest[] {
  if (!all) {
    return requests;
  }

  let expanded = [...requests];
  for (let name of table.names()) {
    if (except.includes(name) || requests.some((request: NameRequest): boolean => request.exportedName == name)) {
      continue;
    }
    expanded.push({ exportedName: name, localName: name });
  }
  return expanded;
}

// Either every request resolves or one error names all that didn't.
export function resolveBindings(table: ExportTable, requests: NameRequest[]): ResolvedBinding[] {
  let bindings: ResolvedBinding[] = [];
  let missing: string[] = [];

  for (let request of requests) {
    let result = table.lookup(request.exportedName);
    if (!result.found) {
      if (!missing.includes(request.exportedName)) {
        missing.push(request.exportedName);
      }
      continue;
    }

    bindings.push({
      exportedName: request.exportedName,
      localName: request.localName,
      value: result.value,
    });
  }

  if (missing.length > 0) {
    throw table.missing(missing);
  }

  return bindings;
}
