import fs from "fs";
import path from "path";

import { ModuleCache } from "../src/cache";
import { CyclicImportError } from "../src/errors";
import { contentFingerprint, mtimeFingerprint } from "../src/fingerprint";
import { createLogger } from "../src/logger";
import { makeTempDir, writeModule } from "./helpers/utils";

const logger = createLogger("silent");

function jsonLoader(evaluations: string[]): (modulePath: string, sourceText: string) => [string, unknown][] {
  return (modulePath: string, sourceText: string): [string, unknown][] => {
    evaluations.push(modulePath);
    return Object.entries(JSON.parse(sourceText));
  };
}

test("Evaluates unchanged modules once", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, "a.json", { x: 1 });
  let evaluations: string[] = [];
  let cache = new ModuleCache(contentFingerprint, logger);

  let first = cache.getOrLoad(modulePath, jsonLoader(evaluations));
  let second = cache.getOrLoad(modulePath, jsonLoader(evaluations));

  expect(second).toBe(first);
  expect(evaluations).toStrictEqual([modulePath]);
  expect(first.entries()).toStrictEqual([["x", 1]]);
  expect(cache.size).toBe(1);
  expect(cache.paths()).toStrictEqual([modulePath]);
});

test("Re-evaluates changed content", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, "a.json", { x: 1 });
  let evaluations: string[] = [];
  let cache = new ModuleCache(contentFingerprint, logger);

  let first = cache.getOrLoad(modulePath, jsonLoader(evaluations));
  let fingerprint = cache.get(modulePath)?.fingerprint;

  writeModule(directory, "a.json", { x: 2 });
  let second = cache.getOrLoad(modulePath, jsonLoader(evaluations));

  expect(second).not.toBe(first);
  expect(second.get("x")).toStrictEqual({ found: true, value: 2 });
  expect(evaluations).toHaveLength(2);
  expect(cache.get(modulePath)?.fingerprint).not.toBe(fingerprint);
});

test("Modification time fingerprints notice changes", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, "a.json", { x: 1 });
  let evaluations: string[] = [];
  let cache = new ModuleCache(mtimeFingerprint, logger);

  cache.getOrLoad(modulePath, jsonLoader(evaluations));
  cache.getOrLoad(modulePath, jsonLoader(evaluations));
  expect(evaluations).toHaveLength(1);

  writeModule(directory, "a.json", { x: 1, y: 2 });
  let future = new Date(Date.now() + 10000);
  fs.utimesSync(modulePath, future, future);

  let namespace = cache.getOrLoad(modulePath, jsonLoader(evaluations));
  expect(evaluations).toHaveLength(2);
  expect(namespace.names()).toStrictEqual(["x", "y"]);
});

test("Invalidating forces a reload", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, "a.json", { x: 1 });
  let evaluations: string[] = [];
  let cache = new ModuleCache(contentFingerprint, logger);

  cache.getOrLoad(modulePath, jsonLoader(evaluations));
  expect(cache.invalidate(modulePath)).toBe(true);
  expect(cache.invalidate(modulePath)).toBe(false);
  expect(cache.has(modulePath)).toBe(false);

  cache.getOrLoad(modulePath, jsonLoader(evaluations));
  cache.clear();
  expect(cache.size).toBe(0);
  cache.getOrLoad(modulePath, jsonLoader(evaluations));

  expect(evaluations).toHaveLength(3);
});

test("Detects cycles", () => {
  let directory = makeTempDir();
  let a = writeModule(directory, "a.json", {});
  let b = writeModule(directory, "b.json", {});
  let cache = new ModuleCache(contentFingerprint, logger);

  let loadB = (): [string, unknown][] => {
    cache.getOrLoad(a, loadA);
    return [];
  };
  let loadA = (): [string, unknown][] => {
    expect(cache.loading()).toStrictEqual([a]);
    cache.getOrLoad(b, loadB);
    return [];
  };

  let error: unknown = null;
  try {
    cache.getOrLoad(a, loadA);
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(CyclicImportError);
  expect(error).toMatchObject({ cycle: [a, b, a] });
  expect(cache.loading()).toStrictEqual([]);
  expect(cache.size).toBe(0);
});

test("Failed evaluations leave no entry", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, "a.json", { x: 1 });
  let evaluations: string[] = [];
  let cache = new ModuleCache(contentFingerprint, logger);

  cache.getOrLoad(modulePath, jsonLoader(evaluations));
  fs.writeFileSync(modulePath, "{ not json");
  expect(() => cache.getOrLoad(modulePath, jsonLoader(evaluations))).toThrow(SyntaxError);

  expect(cache.has(modulePath)).toBe(false);
  expect(cache.loading()).toStrictEqual([]);

  writeModule(directory, "a.json", { x: 3 });
  expect(cache.getOrLoad(modulePath, jsonLoader(evaluations)).get("x")).toStrictEqual({ found: true, value: 3 });
});

test("Records when entries were loaded", () => {
  let directory = makeTempDir();
  let modulePath = writeModule(directory, path.join("nested", "a.json"), { x: 1 });
  let cache = new ModuleCache(contentFingerprint, logger);

  let before = Date.now();
  cache.getOrLoad(modulePath, jsonLoader([]));

  let entry = cache.get(modulePath);
  expect(entry?.modulePath).toBe(modulePath);
  expect(entry?.loadedAt.getTime()).toBeGreaterThanOrEqual(before);
  expect(cache.get(path.join(directory, "missing.json"))).toBeNull();
});

test("Content fingerprints hash the bytes on disk", () => {
  let directory = makeTempDir();
  let first = path.join(directory, "first.js");
  let second = path.join(directory, "second.js");
  fs.writeFileSync(first, Buffer.from([0x61, 0xff]));
  fs.writeFileSync(second, Buffer.from([0x61, 0xfe]));

  let a = contentFingerprint(first);
  let b = contentFingerprint(second);

  // Both decode to the same text.
  expect(a.sourceText).toBe("a\ufffd");
  expect(b.sourceText).toBe(a.sourceText);
  expect(a.value).not.toBe(b.value);
});
