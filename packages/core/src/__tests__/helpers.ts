/**
 * Run `fn` and return the error it throws, narrowed to `type`.
 * Fails the test when nothing (or something else) is thrown.
 */
export function catchError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
