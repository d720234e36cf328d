import path from "path";

// Relative and absolute paths can never be package identifiers.
export function isPathShaped(token: string): boolean {
  return token.startsWith(".") || path.isAbsolute(token);
}

export function normalizeExtensions(extensions: string[]): string[] {
  return Array.from(extensions.reduce((set: Set<string>, current: string): Set<string> => {
    for (let extension of current.split(",")) {
      extension = extension.trim();
      if (extension.length == 0) {
        continue;
      }

      if (!extension.startsWith(".")) {
        extension = "." + extension;
      }
      set.add(extension);
    }
    return set;
  }, new Set<string>()));
}

export function hasOwn(target: object, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, name);
}
