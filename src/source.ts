import fs from "fs";
import path from "path";

import { AmbiguousSourceError, ModuleNotFoundError } from "./errors";
import { PackageRegistry } from "./registry";
import { isPathShaped } from "./utils";

export enum SourceKind {
  Package = "package",
  File = "file",
}

export interface PackageSource {
  readonly kind: SourceKind.Package;
  readonly identifier: string;
}

export interface FileSource {
  readonly kind: SourceKind.File;
  readonly path: string;
}

export type Source = PackageSource | FileSource;

export function packageSource(identifier: string): PackageSource {
  return Object.freeze({ kind: SourceKind.Package, identifier });
}

export function fileSource(modulePath: string): FileSource {
  return Object.freeze({ kind: SourceKind.File, path: modulePath });
}

export function sourceKey(source: Source): string {
  return source.kind == SourceKind.File ? source.path : source.identifier;
}

export function describeSource(source: Source): string {
  return source.kind == SourceKind.File ? `module ${source.path}` : `package '${source.identifier}'`;
}

export interface SourceResolutionOptions {
  // The directory relative sources are found from.
  directory: string;
  extensions: string[];
  registry: PackageRegistry;
  kind?: SourceKind | null;
}

// The real path where there is one, the given path for files that are gone.
export function canonicalPath(filePath: string): string {
  try {
    return fs.realpathSync(filePath);
  } catch {
    return filePath;
  }
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function isReadable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds the module file a token refers to: the path itself, a directory's
 * index file or the path with one of the extensions added.
 */
export function findModuleFile(token: string, directory: string, extensions: string[]): string | null {
  let filePath = path.resolve(directory, token);
  let candidates = [filePath];

  try {
    if (fs.statSync(filePath).isDirectory()) {
      candidates = [];
      filePath = path.join(filePath, "index");
    }
  } catch {
    // Nothing at the bare path, try the extensions.
  }

  for (let extension of extensions) {
    candidates.push(filePath + extension);
  }

  for (let candidate of candidates) {
    if (isFile(candidate) && isReadable(candidate)) {
      return fs.realpathSync(candidate);
    }
  }

  return null;
}

export function resolveSource(token: string, options: SourceResolutionOptions): Source {
  if (options.kind == SourceKind.Package) {
    return packageSource(token);
  }

  let modulePath = findModuleFile(token, options.directory, options.extensions);
  if (options.kind == SourceKind.File) {
    if (!modulePath) {
      throw new ModuleNotFoundError(token, options.directory);
    }
    return fileSource(modulePath);
  }

  if (!modulePath) {
    if (isPathShaped(token)) {
      throw new ModuleNotFoundError(token, options.directory);
    }
    return packageSource(token);
  }

  if (!isPathShaped(token) && options.registry.hasPackage(token, options.directory)) {
    throw new AmbiguousSourceError(token, modulePath);
  }

  return fileSource(modulePath);
}
