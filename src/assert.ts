/* istanbul ignore next: We should be unable to trigger internal errors in tests. */
export function internalError(message: string): never {
  throw new Error(message);
}
