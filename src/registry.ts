import resolve from "resolve";

import { PackageLoadError, PackageNotFoundError } from "./errors";
import { hasOwn, isPathShaped } from "./utils";

export type Lookup = { found: true; value: unknown } | { found: false };

export const NOT_FOUND: Lookup = Object.freeze({ found: false });

export function found(value: unknown): Lookup {
  return { found: true, value };
}

/**
 * The host's table of installed packages. The import engine never installs
 * anything, it only asks for exports of packages that are already there.
 *
 * `directory` is where the import was written. Registries whose packages
 * depend on location resolve from there; others ignore it.
 */
export interface PackageRegistry {
  hasPackage(identifier: string, directory?: string): boolean;
  listExports(identifier: string, directory?: string): string[];
  getExport(identifier: string, name: string, directory?: string): Lookup;
}

function exportTable(value: unknown): Record<string, unknown> {
  if ((typeof value == "object" && value) || typeof value == "function") {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Packages installed for Node, found the way `require` would find them from
 * the importing directory (or `basedir` when no directory is given).
 */
export class NodePackageRegistry implements PackageRegistry {
  // Keyed by the resolved entry file, so two directories that see the same
  // install share one table.
  private tables: Map<string, Record<string, unknown>> = new Map();

  public constructor(public readonly basedir: string) {
  }

  private resolvePackage(identifier: string, directory: string | undefined): string | null {
    if (isPathShaped(identifier)) {
      return null;
    }

    if (resolve.isCore(identifier)) {
      return identifier;
    }

    try {
      return resolve.sync(identifier, { basedir: directory ?? this.basedir });
    } catch {
      return null;
    }
  }

  private table(identifier: string, directory: string | undefined): Record<string, unknown> {
    let resolved = this.resolvePackage(identifier, directory);
    if (!resolved) {
      throw new PackageNotFoundError(identifier);
    }

    let table = this.tables.get(resolved);
    if (table) {
      return table;
    }

    let loaded: unknown;
    try {
      // eslint-disable-next-line @typescript-eslint/no-var-requires
      loaded = require(resolved);
    } catch (e) {
      throw new PackageLoadError(identifier, e);
    }

    table = exportTable(loaded);
    this.tables.set(resolved, table);
    return table;
  }

  public hasPackage(identifier: string, directory?: string): boolean {
    return this.resolvePackage(identifier, directory) !== null;
  }

  public listExports(identifier: string, directory?: string): string[] {
    return Object.keys(this.table(identifier, directory));
  }

  public getExport(identifier: string, name: string, directory?: string): Lookup {
    let table = this.table(identifier, directory);
    return hasOwn(table, name) ? found(table[name]) : NOT_FOUND;
  }
}

export class StaticRegistry implements PackageRegistry {
  private tables: Map<string, Map<string, unknown>> = new Map();

  public constructor(tables: Record<string, Record<string, unknown>> = {}) {
    for (let [identifier, exports] of Object.entries(tables)) {
      this.define(identifier, exports);
    }
  }

  public define(identifier: string, exports: Record<string, unknown>): void {
    this.tables.set(identifier, new Map(Object.entries(exports)));
  }

  private table(identifier: string): Map<string, unknown> {
    let table = this.tables.get(identifier);
    if (!table) {
      throw new PackageNotFoundError(identifier);
    }
    return table;
  }

  public hasPackage(identifier: string): boolean {
    return this.tables.has(identifier);
  }

  public listExports(identifier: string): string[] {
    return Array.from(this.table(identifier).keys());
  }

  public getExport(identifier: string, name: string): Lookup {
    let table = this.table(identifier);
    return table.has(name) ? found(table.get(name)) : NOT_FOUND;
  }
}
