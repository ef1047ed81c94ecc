import { z } from 'zod';

export const walkerOptionsSchema = z.object({
  /** Entity hops per walk; a walk holds at most 2 * depth + 1 vertices */
  depth: z.number().int().nonnegative(),
  /** Cap on walks per root; Infinity keeps every walk */
  walksPerGraph: z.union([z.number().int().positive(), z.literal(Infinity)]),
  wlIterations: z.number().int().nonnegative().default(4),
  seed: z.number().int().default(42),
});

export type WalkerOptionsInput = z.input<typeof walkerOptionsSchema>;
export type WalkerOptions = z.output<typeof walkerOptionsSchema>;

/**
 * Validate and default walker options.
 * @throws ZodError when a field is missing or out of range
 * @public
 */
export function parseWalkerOptions(input: unknown): WalkerOptions {
  return walkerOptionsSchema.parse(input);
}
