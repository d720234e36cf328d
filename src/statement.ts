import { InvalidImportStatementError } from "./errors";
import { SourceKind } from "./source";

export enum PlacementMode {
  // The caller's own scope.
  Here = "here",
  // A registered namespace in the search chain.
  Into = "into",
}

export type Placement =
  { mode: PlacementMode.Here } |
  { mode: PlacementMode.Into; name: string };

export interface NameRequest {
  readonly exportedName: string;
  readonly localName: string;
}

export interface ImportStatement {
  source: string;
  // In the order the statement gave them.
  requests: NameRequest[];
  placement: Placement;
  all: boolean;
  except: string[];
  directory: string | null;
  kind: SourceKind | null;
}

export const OPTION_PREFIX = ".";

export interface StatementOptions {
  ".from"?: string;
  ".into"?: string;
  ".all"?: boolean;
  ".except"?: string[];
  ".directory"?: string;
  ".kind"?: SourceKind | `${SourceKind}`;
}

// A rename map is `{ localName: "exportedName" }` and may share an object
// with options.
export type ImportArgument = string | StatementOptions | Record<string, string | boolean | string[] | undefined>;

export type StatementForm =
  { form: "from"; defaultInto: string } |
  { form: "into"; into: string } |
  { form: "here" };

const KNOWN_OPTIONS = [".from", ".into", ".all", ".except", ".directory", ".kind"];

type RawOptions = Map<string, unknown>;

function describe(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "an array";
  }
  return typeof value == "string" ? `'${value}'` : `a ${typeof value}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value == "object" && value !== null && !Array.isArray(value);
}

function stringOption(options: RawOptions, key: string): string | null {
  let value = options.get(key);
  if (value === undefined) {
    return null;
  }
  if (typeof value != "string" || value.length == 0) {
    throw new InvalidImportStatementError(`${key} must be a non-empty string, got ${describe(value)}.`, value);
  }
  return value;
}

function booleanOption(options: RawOptions, key: string): boolean {
  let value = options.get(key);
  if (value === undefined) {
    return false;
  }
  if (typeof value != "boolean") {
    throw new InvalidImportStatementError(`${key} must be a boolean, got ${describe(value)}.`, value);
  }
  return value;
}

function namesOption(options: RawOptions, key: string): string[] {
  let value = options.get(key);
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((name: unknown): boolean => typeof name == "string" && name.length > 0)) {
    throw new InvalidImportStatementError(`${key} must be an array of non-empty names.`, value);
  }
  return value.map((name: unknown): string => String(name));
}

function kindOption(options: RawOptions): SourceKind | null {
  let value = stringOption(options, ".kind");
  if (value === null) {
    return null;
  }

  switch (value) {
    case SourceKind.File:
      return SourceKind.File;
    case SourceKind.Package:
      return SourceKind.Package;
    default:
      throw new InvalidImportStatementError(`.kind must be '${SourceKind.File}' or '${SourceKind.Package}', got ${describe(value)}.`, value);
  }
}

function addRequest(requests: NameRequest[], request: NameRequest): void {
  if (!requests.some((r: NameRequest): boolean => r.exportedName == request.exportedName && r.localName == request.localName)) {
    requests.push(request);
  }
}

/**
 * Turns the arguments of an import call into a statement. Malformed
 * arguments fail immediately; whether the names exist is only known once the
 * source is opened.
 */
export function parseStatement(form: StatementForm, args: unknown[]): ImportStatement {
  let positional: string[] = [];
  let requests: NameRequest[] = [];
  let options: RawOptions = new Map();

  // Names given positionally are only known to be names once we know whether
  // `.from` supplied the source.
  let pending: (string | NameRequest)[] = [];

  for (let arg of args) {
    if (typeof arg == "string") {
      if (arg.length == 0) {
        throw new InvalidImportStatementError("Names must not be empty.", arg);
      }
      positional.push(arg);
      pending.push(arg);
      continue;
    }

    if (!isRecord(arg)) {
      throw new InvalidImportStatementError(`Expected a name, a rename map or options but got ${describe(arg)}.`, arg);
    }

    for (let [key, value] of Object.entries(arg)) {
      if (key.startsWith(OPTION_PREFIX)) {
        if (!KNOWN_OPTIONS.includes(key)) {
          throw new InvalidImportStatementError(`Unknown option ${key}.`, arg);
        }
        if (options.has(key)) {
          throw new InvalidImportStatementError(`Option ${key} is given more than once.`, arg);
        }
        options.set(key, value);
        continue;
      }

      if (key.length == 0) {
        throw new InvalidImportStatementError("Local names must not be empty.", arg);
      }
      if (typeof value != "string" || value.length == 0) {
        throw new InvalidImportStatementError(`The export renamed to '${key}' must be a non-empty name, got ${describe(value)}.`, arg);
      }
      pending.push({ exportedName: value, localName: key });
    }
  }

  let source = stringOption(options, ".from");
  if (source === null) {
    let first = positional[0];
    if (first === undefined) {
      throw new InvalidImportStatementError("No source given.");
    }
    source = first;
    pending.splice(pending.indexOf(first), 1);
  }

  for (let item of pending) {
    addRequest(requests, typeof item == "string" ? { exportedName: item, localName: item } : item);
  }

  let into = stringOption(options, ".into");
  let placement: Placement;
  switch (form.form) {
    case "here":
      if (into !== null) {
        throw new InvalidImportStatementError("A statement placing bindings in the caller's scope cannot also place them with .into.");
      }
      placement = { mode: PlacementMode.Here };
      break;
    case "into":
      if (into !== null) {
        throw new InvalidImportStatementError("The destination is already given, .into cannot be used as well.");
      }
      placement = { mode: PlacementMode.Into, name: form.into };
      break;
    case "from":
      placement = { mode: PlacementMode.Into, name: into ?? form.defaultInto };
      break;
  }

  if (placement.mode == PlacementMode.Into && placement.name.length == 0) {
    throw new InvalidImportStatementError("The destination namespace name must not be empty.");
  }

  let all = booleanOption(options, ".all");
  let except = namesOption(options, ".except");
  if (except.length > 0 && !all) {
    throw new InvalidImportStatementError(".except can only be used together with .all.");
  }

  if (requests.length == 0 && !all) {
    throw new InvalidImportStatementError(`No names requested from '${source}'.`);
  }

  return {
    source,
    requests,
    placement,
    all,
    except,
    directory: stringOption(options, ".directory"),
    kind: kindOption(options),
  };
}
