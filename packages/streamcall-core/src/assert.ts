// Fatal assertions for contract violations that indicate a bug in the caller.

/** Thrown when an internal invariant or a fatal usage contract is broken. */
export class AssertionFailure extends Error {
  constructor(message: string) {
    super(`ASSERTION FAILED: ${message}`);
    this.name = "AssertionFailure";
  }
}

/**
 * Fail hard if `condition` doesn't hold.
 *
 * Not meant to be caught: the owning executor lets these escape as uncaught
 * exceptions.
 */
export function hardAssert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new AssertionFailure(message);
  }
}
