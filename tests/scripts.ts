import path from "path";

import { ImportEngine } from "../src/engine";
import { EvaluationError, NameNotFoundInModuleError } from "../src/errors";
import { declaredNames, parseScript } from "../src/evaluator";
import { StaticRegistry } from "../src/registry";
import { getExample } from "./helpers/utils";

const example = getExample("scripts");

function buildEngine(): ImportEngine {
  return new ImportEngine({ directory: example, logLevel: "silent" }, { registry: new StaticRegistry() });
}

test("Declared names", () => {
  let program = parseScript("var a = 1; let b; const c = 2; function d() { var inner; } class E {} f = 3;");
  expect(declaredNames(program)).toStrictEqual(["a", "b", "c", "d", "E"]);
});

test("Each parse stands alone", () => {
  expect(declaredNames(parseScript("var first = 1;"))).toStrictEqual(["first"]);
  expect(declaredNames(parseScript("let second = 2; const third = 3;"))).toStrictEqual(["second", "third"]);
  expect(() => parseScript("var = ;")).toThrow();
});

test("Exports the top level declarations", () => {
  let engine = buildEngine();
  let namespace = engine.load(path.join(example, "values.js"));

  let names = namespace.names();
  names.sort();
  expect(names).toStrictEqual(["Box", "counter", "double", "label", "limits"]);

  expect(namespace.get("counter")).toStrictEqual({ found: true, value: 1 });
  expect(namespace.get("label")).toStrictEqual({ found: true, value: "values" });
  expect(namespace.get("undeclared")).toStrictEqual({ found: false });

  let limits = namespace.get("limits");
  expect(limits.found && limits.value).toEqual({ low: 1, high: 9 });

  let double = namespace.get("double");
  if (!double.found || typeof double.value != "function") {
    throw new Error("Expected double to be a function.");
  }
  expect(double.value(4)).toBe(8);
});

test("Lists what a module exports", () => {
  let engine = buildEngine();
  let names = engine.what("./values.js");
  names.sort();
  expect(names).toStrictEqual(["Box", "counter", "double", "label", "limits"]);
});

test("Syntax errors", () => {
  let engine = buildEngine();
  let modulePath = path.join(example, "syntax-error.js");

  let error: unknown = null;
  try {
    engine.load(modulePath);
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(EvaluationError);
  expect(error).toMatchObject({ modulePath });
  expect(engine.cache.has(modulePath)).toBe(false);
});

test("Runtime errors", () => {
  let engine = buildEngine();
  let modulePath = path.join(example, "throws.js");

  expect(() => engine.load(modulePath)).toThrow(`Failed to evaluate ${modulePath}: boom`);
  expect(() => engine.load(modulePath)).toThrow(EvaluationError);
});

test("Import failures inside a module pass through", () => {
  let engine = buildEngine();

  let error: unknown = null;
  try {
    engine.load(path.join(example, "missing-import.js"));
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(NameNotFoundInModuleError);
  expect(error).toMatchObject({
    modulePath: path.join(example, "values.js"),
    names: ["nope"],
  });
  expect(engine.chain.has("imports")).toBe(false);
});

test("Modules see the search chain", () => {
  let engine = buildEngine();
  let namespace = engine.load(path.join(example, "uses-chain.js"));

  expect(namespace.get("seen")).toStrictEqual({ found: true, value: "values" });
  expect(engine.chain.get("shared")?.entries()).toStrictEqual([["label", "values"]]);
});
