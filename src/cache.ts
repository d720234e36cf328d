import fs from "fs";

import winston from "winston";

import { internalError } from "./assert";
import { CyclicImportError } from "./errors";
import { Fingerprinter } from "./fingerprint";
import { Namespace } from "./namespace";

export interface ModuleCacheEntry {
  readonly modulePath: string;
  readonly fingerprint: string;
  readonly namespace: Namespace;
  readonly loadedAt: Date;
}

export type ModuleLoader = (modulePath: string, sourceText: string) => Iterable<[string, unknown]>;

/**
 * Evaluated modules keyed by their canonical path. A module is evaluated at
 * most once for any given fingerprint.
 */
export class ModuleCache {
  private entries: Map<string, ModuleCacheEntry> = new Map();
  private loadStack: string[] = [];

  public constructor(
    private readonly fingerprinter: Fingerprinter,
    private readonly logger: winston.Logger,
  ) {
  }

  public get size(): number {
    return this.entries.size;
  }

  public paths(): string[] {
    return Array.from(this.entries.keys());
  }

  public get(modulePath: string): ModuleCacheEntry | null {
    return this.entries.get(modulePath) || null;
  }

  public has(modulePath: string): boolean {
    return this.entries.has(modulePath);
  }

  // The modules currently being evaluated, outermost first.
  public loading(): string[] {
    return [...this.loadStack];
  }

  public invalidate(modulePath: string): boolean {
    let removed = this.entries.delete(modulePath);
    if (removed) {
      this.logger.debug("Invalidated module", { modulePath });
    }
    return removed;
  }

  public clear(): void {
    this.entries.clear();
    this.logger.debug("Cleared module cache");
  }

  public getOrLoad(modulePath: string, load: ModuleLoader): Namespace {
    let start = this.loadStack.indexOf(modulePath);
    if (start >= 0) {
      throw new CyclicImportError([...this.loadStack.slice(start), modulePath]);
    }

    let fingerprint = this.fingerprinter(modulePath);
    let entry = this.entries.get(modulePath);
    if (entry && entry.fingerprint == fingerprint.value) {
      this.logger.debug("Using cached module", { modulePath });
      return entry.namespace;
    }

    let sourceText = fingerprint.sourceText ?? fs.readFileSync(modulePath, { encoding: "utf8" });
    this.logger.debug(entry ? "Re-evaluating changed module" : "Evaluating module", { modulePath });

    this.loadStack.push(modulePath);
    try {
      let namespace = new Namespace(null, load(modulePath, sourceText));
      this.entries.set(modulePath, {
        modulePath,
        fingerprint: fingerprint.value,
        namespace,
        loadedAt: new Date(),
      });
      return namespace;
    } catch (e) {
      this.entries.delete(modulePath);
      throw e;
    } finally {
      let popped = this.loadStack.pop();
      /* istanbul ignore if: We should be unable to trigger assertions in tests. */
      if (popped != modulePath) {
        internalError(`Module load stack is out of order, expected ${modulePath} but found ${popped}.`);
      }
    }
  }
}
