/**
 * Dev-only warnings
 */

import { isProduction, logger } from './logger';

/**
 * Warn when `condition` is false. A function condition is only evaluated
 * outside production.
 */
export function devWarn(
  condition: boolean | (() => boolean),
  message: string
): void {
  if (isProduction()) return;
  const holds = typeof condition === 'function' ? condition() : condition;
  if (!holds) {
    logger.warn(`[router] ${message}`);
  }
}
