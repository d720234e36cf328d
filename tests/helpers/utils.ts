import fs from "fs";
import os from "os";
import path from "path";

import { EvaluationHost, Evaluator } from "../../src/evaluator";

export function getExample(name: string): string {
  return fs.realpathSync(path.join(__dirname, "..", "examples", name));
}

export function makeTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "selective-import-")));
}

export function writeModule(directory: string, name: string, contents: object | string): string {
  let filePath = path.join(directory, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, typeof contents == "string" ? contents : JSON.stringify(contents));
  return filePath;
}

/**
 * Treats module files as JSON objects of bindings and counts how often each
 * path is evaluated.
 */
export class JsonEvaluator implements Evaluator {
  public readonly evaluations: string[] = [];

  public evaluate(modulePath: string, sourceText: string, host: EvaluationHost): Map<string, unknown> {
    this.evaluations.push(modulePath);

    let parsed: unknown = JSON.parse(sourceText);
    let bindings: Map<string, unknown> = new Map();
    if (typeof parsed != "object" || !parsed) {
      return bindings;
    }

    for (let [name, value] of Object.entries(parsed)) {
      // `{ "@import": [...] }` lets a module import while it is being loaded.
      if (name == "@import" && Array.isArray(value)) {
        host.importFrom(...value);
        continue;
      }
      bindings.set(name, value);
    }
    return bindings;
  }

  public count(modulePath: string): number {
    return this.evaluations.filter((evaluated: string): boolean => evaluated == modulePath).length;
  }
}
