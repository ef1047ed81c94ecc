/**
 * Conditional console.log that only outputs when WL_WALKS_VERBOSE=true is set.
 * Keeps library callers' output clean while leaving timings one env var away.
 *
 * Usage:
 *   WL_WALKS_VERBOSE=true npm test
 *
 * @internal
 */
export function verboseLog(module: string, ...args: unknown[]): void {
  if (process.env.WL_WALKS_VERBOSE === 'true') {
    console.log(`[${module}]`, ...args);
  }
}
