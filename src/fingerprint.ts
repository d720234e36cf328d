import crypto from "crypto";
import fs from "fs";

export enum FingerprintStrategy {
  // Modification time and size. Cheap, but two edits inside the timestamp
  // resolution look the same.
  Mtime = "mtime",
  Content = "content",
}

export interface Fingerprint {
  value: string;
  // The contents, when computing the fingerprint had to read them anyway.
  sourceText: string | null;
}

export type Fingerprinter = (modulePath: string) => Fingerprint;

export function mtimeFingerprint(modulePath: string): Fingerprint {
  let stats = fs.statSync(modulePath);
  return {
    value: `${stats.mtimeMs}:${stats.size}`,
    sourceText: null,
  };
}

export function contentFingerprint(modulePath: string): Fingerprint {
  let contents = fs.readFileSync(modulePath);
  return {
    value: crypto.createHash("sha256").update(contents).digest("hex"),
    sourceText: contents.toString("utf8"),
  };
}

export function isFingerprintStrategy(value: string): value is FingerprintStrategy {
  return Object.values(FingerprintStrategy).some((strategy: string): boolean => strategy == value);
}

export function fingerprinterFor(strategy: FingerprintStrategy): Fingerprinter {
  switch (strategy) {
    case FingerprintStrategy.Mtime:
      return mtimeFingerprint;
    case FingerprintStrategy.Content:
      return contentFingerprint;
  }
}
