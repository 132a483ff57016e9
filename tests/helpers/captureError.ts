/**
 * Runs `fn` and returns the error it throws, narrowed to `type`.
 * Fails the test if nothing is thrown or the error has another type.
 */
export function captureError<E extends Error>(
  fn: () => unknown,
  type: abstract new (...args: never[]) => E,
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error("expected function to throw");
}
