import vm from "vm";

import { analyze, Variable } from "eslint-scope";
// eslint-disable-next-line import/no-unresolved
import * as ESTree from "estree";

import { EvaluationError, ImportError } from "./errors";
import { ObjectScope, Scope } from "./namespace";
import { Lookup } from "./registry";
import { ImportArgument } from "./statement";

const ECMA_VERSION = 2022;

/**
 * What an evaluated script can do with the engine that loaded it. Relative
 * sources are found from the script's own directory.
 */
export interface EvaluationHost {
  importFrom(...args: ImportArgument[]): void;
  importInto(into: string, ...args: ImportArgument[]): void;
  importHere(scope: Scope, ...args: ImportArgument[]): void;
  lookup(name: string): Lookup;
}

export interface Evaluator {
  // Evaluates in a fresh namespace and returns the bindings the module
  // defines.
  evaluate(modulePath: string, sourceText: string, host: EvaluationHost): Iterable<[string, unknown]>;
}

type ParserModule = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  parse(text: string, options?: any): ESTree.Program;
};

// espree ships no types of its own.
// eslint-disable-next-line @typescript-eslint/no-var-requires
const parser = require("espree") as ParserModule;

export function parseScript(sourceText: string): ESTree.Program {
  return parser.parse(sourceText, {
    ecmaVersion: ECMA_VERSION,
    sourceType: "script",
    range: true,
    loc: true,
  });
}

// The names a script declares at its top level, in declaration order.
export function declaredNames(program: ESTree.Program): string[] {
  let scopeManager = analyze(program, {
    ecmaVersion: ECMA_VERSION,
    sourceType: "script",
  });

  let globalScope = scopeManager.acquire(program);
  if (!globalScope) {
    return [];
  }

  return globalScope.variables
    .filter((variable: Variable): boolean => variable.defs.length > 0)
    .map((variable: Variable): string => variable.name);
}

/**
 * Runs script files in their own `vm` context. The names the script declares
 * at its top level are its exports; anything it brings in with `importHere`
 * stays private to it.
 */
export class ScriptEvaluator implements Evaluator {
  public evaluate(modulePath: string, sourceText: string, host: EvaluationHost): Map<string, unknown> {
    let names: string[];
    try {
      names = declaredNames(parseScript(sourceText));
    } catch (e) {
      throw new EvaluationError(modulePath, e);
    }

    let sandbox: Record<string, unknown> = {};
    let scope = new ObjectScope(sandbox);
    sandbox.console = console;
    sandbox.importFrom = (...args: ImportArgument[]): void => host.importFrom(...args);
    sandbox.importInto = (into: string, ...args: ImportArgument[]): void => host.importInto(into, ...args);
    sandbox.importHere = (...args: ImportArgument[]): void => host.importHere(scope, ...args);
    sandbox.lookup = (name: string): unknown => {
      let result = host.lookup(name);
      if (!result.found) {
        throw new ReferenceError(`${name} is not defined in any attached namespace`);
      }
      return result.value;
    };

    let context = vm.createContext(sandbox, { name: modulePath });
    try {
      new vm.Script(sourceText, { filename: modulePath }).runInContext(context);
    } catch (e) {
      if (e instanceof ImportError) {
        throw e;
      }
      throw new EvaluationError(modulePath, e);
    }

    let bindings: Map<string, unknown> = new Map();
    for (let name of names) {
      // Lexical declarations don't appear on the global object so read them
      // back through the context.
      bindings.set(name, vm.runInContext(name, context));
    }
    return bindings;
  }
}
