/**
 * Centralized logger interface
 * - Keeps production builds silent
 * - Protects against missing `console` in some environments
 */

export function isProduction(): boolean {
  return (
    typeof process !== 'undefined' && process.env.NODE_ENV === 'production'
  );
}

function callConsole(method: 'warn', args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn: unknown = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, args);
  } catch {
    // ignore logging errors
  }
}

export const logger = {
  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },
};
