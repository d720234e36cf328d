import { Source, describeSource } from "./source";

export enum ImportErrorType {
  InvalidStatement = "invalid-statement",
  AmbiguousSource = "ambiguous-source",
  ModuleNotFound = "module-not-found",
  PackageNotFound = "package-not-found",
  PackageLoad = "package-load",
  NameNotExported = "name-not-exported",
  NameNotFoundInModule = "name-not-found-in-module",
  DuplicateLocalName = "duplicate-local-name",
  CyclicImport = "cyclic-import",
  Evaluation = "evaluation",
}

export abstract class ImportError extends Error {
  public abstract readonly type: ImportErrorType;

  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidImportStatementError extends ImportError {
  public readonly type = ImportErrorType.InvalidStatement;

  public constructor(public readonly reason: string, public readonly argument?: unknown) {
    super(`Invalid import statement: ${reason}`);
  }
}

export class AmbiguousSourceError extends ImportError {
  public readonly type = ImportErrorType.AmbiguousSource;

  public constructor(public readonly token: string, public readonly modulePath: string) {
    super(`'${token}' names both the package '${token}' and the file ${modulePath}. Pass { ".kind": "package" } or { ".kind": "file" } to choose.`);
  }
}

export class ModuleNotFoundError extends ImportError {
  public readonly type = ImportErrorType.ModuleNotFound;

  public constructor(public readonly token: string, public readonly directory: string) {
    super(`Unable to locate a module file for '${token}' from ${directory}.`);
  }
}

export class PackageNotFoundError extends ImportError {
  public readonly type = ImportErrorType.PackageNotFound;

  public constructor(public readonly identifier: string) {
    super(`Package '${identifier}' is not available.`);
  }
}

export class PackageLoadError extends ImportError {
  public readonly type = ImportErrorType.PackageLoad;

  public constructor(public readonly identifier: string, public readonly cause: unknown) {
    super(`Package '${identifier}' could not be loaded: ${errorMessage(cause)}`);
  }
}

export class NameNotExportedError extends ImportError {
  public readonly type = ImportErrorType.NameNotExported;

  public constructor(public readonly source: Source, public readonly names: string[]) {
    super(`Not exported by ${describeSource(source)}: ${names.join(", ")}`);
  }
}

export class NameNotFoundInModuleError extends ImportError {
  public readonly type = ImportErrorType.NameNotFoundInModule;

  public constructor(public readonly modulePath: string, public readonly names: string[]) {
    super(`Not found in module ${modulePath}: ${names.join(", ")}`);
  }
}

export class DuplicateLocalNameError extends ImportError {
  public readonly type = ImportErrorType.DuplicateLocalName;

  public constructor(public readonly localName: string, public readonly exportedNames: string[]) {
    super(`Local name '${localName}' is requested for more than one export: ${exportedNames.join(", ")}`);
  }
}

export class CyclicImportError extends ImportError {
  public readonly type = ImportErrorType.CyclicImport;

  public constructor(public readonly cycle: string[]) {
    super(`Import cycle: ${cycle.join(" -> ")}`);
  }
}

export class EvaluationError extends ImportError {
  public readonly type = ImportErrorType.Evaluation;

  public constructor(public readonly modulePath: string, public readonly cause: unknown) {
    super(`Failed to evaluate ${modulePath}: ${errorMessage(cause)}`);
  }
}

// Errors thrown by script code come from another realm so `instanceof Error`
// can't be trusted here.
export function errorMessage(error: unknown): string {
  if (typeof error == "object" && error && "message" in error && typeof error.message == "string") {
    return error.message;
  }
  return String(error);
}
