import path from "path";

import { FingerprintStrategy, isFingerprintStrategy } from "./fingerprint";
import { LogLevel, isLogLevel } from "./logger";
import { normalizeExtensions } from "./utils";

export const DEFAULT_INTO = "imports";

export interface EngineOptions {
  // Where relative sources in top-level statements are found from.
  directory?: string;
  defaultInto?: string;
  extensions?: string[];
  fingerprint?: FingerprintStrategy | `${FingerprintStrategy}`;
  logLevel?: LogLevel;
}

export interface EngineConfig {
  directory: string;
  defaultInto: string;
  extensions: string[];
  fingerprint: FingerprintStrategy;
  logLevel: LogLevel;
}

type Environment = Record<string, string | undefined>;

function parseFingerprint(value: string, origin: string): FingerprintStrategy {
  if (!isFingerprintStrategy(value)) {
    throw new Error(`Unknown fingerprint strategy '${value}' from ${origin}, expected one of ${Object.values(FingerprintStrategy).join(", ")}.`);
  }
  return value;
}

function parseLogLevel(value: string, origin: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(`Unknown log level '${value}' from ${origin}.`);
  }
  return value;
}

export function resolveConfig(options: EngineOptions = {}, env: Environment = process.env): EngineConfig {
  let fingerprint = FingerprintStrategy.Content;
  if (options.fingerprint) {
    fingerprint = parseFingerprint(options.fingerprint, "options");
  } else if (env.SELECTIVE_IMPORT_FINGERPRINT) {
    fingerprint = parseFingerprint(env.SELECTIVE_IMPORT_FINGERPRINT, "SELECTIVE_IMPORT_FINGERPRINT");
  }

  let logLevel: LogLevel = "warn";
  if (options.logLevel) {
    logLevel = parseLogLevel(options.logLevel, "options");
  } else if (env.SELECTIVE_IMPORT_LOG_LEVEL) {
    logLevel = parseLogLevel(env.SELECTIVE_IMPORT_LOG_LEVEL, "SELECTIVE_IMPORT_LOG_LEVEL");
  }

  let defaultInto = options.defaultInto ?? DEFAULT_INTO;
  if (defaultInto.length == 0) {
    throw new Error("The default namespace name must not be empty.");
  }

  return {
    directory: path.resolve(process.cwd(), options.directory ?? "."),
    defaultInto,
    extensions: normalizeExtensions(options.extensions ?? [".js"]),
    fingerprint,
    logLevel,
  };
}
