/**
 * Bench helpers
 *
 * Fixed sizes keep benchmark runs comparable across machines and CI.
 */

export function benchN(defaultN: number): number {
  return defaultN;
}
