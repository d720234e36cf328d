import path from "path";

import winston from "winston";

import { ModuleCache } from "./cache";
import { SearchChain } from "./chain";
import { EngineConfig, EngineOptions, resolveConfig } from "./config";
import { EvaluationError, ImportError, InvalidImportStatementError, PackageNotFoundError } from "./errors";
import { EvaluationHost, Evaluator, ScriptEvaluator } from "./evaluator";
import { fingerprinterFor } from "./fingerprint";
import { createLogger } from "./logger";
import { Namespace, Scope } from "./namespace";
import { Destination, checkLocalNames, place } from "./placement";
import { Lookup, NodePackageRegistry, PackageRegistry } from "./registry";
import { ExportTable, ModuleExportTable, PackageExportTable, ResolvedBinding, expandRequests, resolveBindings } from "./resolver";
import { Source, SourceKind, canonicalPath, resolveSource, sourceKey } from "./source";
import { ImportArgument, ImportStatement, PlacementMode, StatementForm, parseStatement } from "./statement";

export interface EngineCollaborators {
  registry?: PackageRegistry;
  evaluator?: Evaluator;
  cache?: ModuleCache;
  chain?: SearchChain;
  logger?: winston.Logger;
}

// Where a statement was written.
export interface CallerContext {
  directory: string;
}

/**
 * Resolves import statements against packages and module files and places
 * the resulting bindings. All process-wide state (the module cache and the
 * search chain) belongs to the engine instance.
 */
export class ImportEngine {
  public readonly config: EngineConfig;
  public readonly registry: PackageRegistry;
  public readonly evaluator: Evaluator;
  public readonly cache: ModuleCache;
  public readonly chain: SearchChain;
  public readonly logger: winston.Logger;

  public constructor(options: EngineOptions = {}, collaborators: EngineCollaborators = {}) {
    this.config = resolveConfig(options);
    this.logger = collaborators.logger ?? createLogger(this.config.logLevel);
    this.registry = collaborators.registry ?? new NodePackageRegistry(this.config.directory);
    this.evaluator = collaborators.evaluator ?? new ScriptEvaluator();
    this.cache = collaborators.cache ?? new ModuleCache(fingerprinterFor(this.config.fingerprint), this.logger);
    this.chain = collaborators.chain ?? new SearchChain();
  }

  private get topLevel(): CallerContext {
    return { directory: this.config.directory };
  }

  public importFrom(...args: ImportArgument[]): void {
    this.run({ form: "from", defaultInto: this.config.defaultInto }, args, null, this.topLevel);
  }

  public importInto(into: string, ...args: ImportArgument[]): void {
    this.run({ form: "into", into }, args, null, this.topLevel);
  }

  public importHere(scope: Scope, ...args: ImportArgument[]): void {
    this.run({ form: "here" }, args, scope, this.topLevel);
  }

  private run(form: StatementForm, args: ImportArgument[], scope: Scope | null, caller: CallerContext): void {
    this.execute(parseStatement(form, args), caller, scope);
  }

  /**
   * Carries out a parsed statement. Every requested binding is placed or, if
   * anything fails, none are.
   */
  public execute(statement: ImportStatement, caller: CallerContext, scope: Scope | null = null): void {
    let destination: Destination;
    if (statement.placement.mode == PlacementMode.Here) {
      if (!scope) {
        throw new InvalidImportStatementError("There is no caller scope to place bindings in.");
      }
      destination = { mode: PlacementMode.Here, scope };
    } else {
      destination = { mode: PlacementMode.Into, name: statement.placement.name };
    }

    let directory = this.directoryFor(caller, statement.directory);
    let table = this.open(this.resolve(statement.source, caller, statement.directory, statement.kind), directory);
    let requests = expandRequests(table, statement.requests, statement.all, statement.except);
    checkLocalNames(requests);

    let bindings = resolveBindings(table, requests);
    place(bindings, destination, this.chain);

    this.logger.debug("Placed bindings", {
      source: sourceKey(table.source),
      destination: destination.mode == PlacementMode.Here ? "here" : destination.name,
      names: bindings.map((binding: ResolvedBinding): string => binding.localName),
    });
  }

  private directoryFor(caller: CallerContext, directory: string | null): string {
    return directory ? path.resolve(caller.directory, directory) : caller.directory;
  }

  public resolve(token: string, caller: CallerContext = this.topLevel, directory: string | null = null, kind: SourceKind | null = null): Source {
    return resolveSource(token, {
      directory: this.directoryFor(caller, directory),
      extensions: this.config.extensions,
      registry: this.registry,
      kind,
    });
  }

  /**
   * Opens a resolved source. Packages are looked up from `directory`, where
   * the statement was written.
   */
  public open(source: Source, directory: string = this.config.directory): ExportTable {
    if (source.kind == SourceKind.Package) {
      if (!this.registry.hasPackage(source.identifier, directory)) {
        throw new PackageNotFoundError(source.identifier);
      }
      return new PackageExportTable(source, this.registry, directory);
    }

    return new ModuleExportTable(source, this.load(source.path));
  }

  public load(modulePath: string): Namespace {
    return this.cache.getOrLoad(modulePath, (loadPath: string, sourceText: string): Iterable<[string, unknown]> => {
      try {
        return this.evaluator.evaluate(loadPath, sourceText, this.hostFor({ directory: path.dirname(loadPath) }));
      } catch (e) {
        if (e instanceof ImportError) {
          throw e;
        }
        throw new EvaluationError(loadPath, e);
      }
    });
  }

  // The names a source exports.
  public what(token: string, options: { directory?: string; kind?: SourceKind } = {}): string[] {
    let directory = this.directoryFor(this.topLevel, options.directory ?? null);
    return this.open(this.resolve(token, this.topLevel, options.directory ?? null, options.kind ?? null), directory).names();
  }

  public invalidate(modulePath: string): boolean {
    return this.cache.invalidate(canonicalPath(path.resolve(this.config.directory, modulePath)));
  }

  public clearCache(): void {
    this.cache.clear();
  }

  public hostFor(caller: CallerContext): EvaluationHost {
    return {
      importFrom: (...args: ImportArgument[]): void => {
        this.run({ form: "from", defaultInto: this.config.defaultInto }, args, null, caller);
      },
      importInto: (into: string, ...args: ImportArgument[]): void => {
        this.run({ form: "into", into }, args, null, caller);
      },
      importHere: (scope: Scope, ...args: ImportArgument[]): void => {
        this.run({ form: "here" }, args, scope, caller);
      },
      lookup: (name: string): Lookup => this.chain.lookup(name),
    };
  }
}
