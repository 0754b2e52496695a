/**
 * Invariant assertion utilities for correctness checking
 *
 * Core principle: fail fast when invariants are violated
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[Router Invariant] ${message}${contextStr}`);
  }
}

/**
 * Assert the single-writer precondition (no registration already in flight)
 * @internal
 */
export function assertWritePrecondition(
  writing: boolean,
  violationMessage: string,
  context?: Record<string, unknown>
): void {
  invariant(!writing, `[Write Precondition] ${violationMessage}`, context);
}

/**
 * Verify a published length index is strictly descending
 * @internal
 */
export function assertDescending(lengths: readonly number[]): void {
  for (let i = 1; i < lengths.length; i++) {
    invariant(
      lengths[i - 1] > lengths[i],
      `Length index out of order at position ${i}`,
      { lengths: [...lengths] }
    );
  }
}
