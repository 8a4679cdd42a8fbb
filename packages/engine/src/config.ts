import { z } from "zod";
import { ValidationError } from "./errors";
import type { UniformSeriesOptions } from "./types";

export const DEFAULT_CACHE_TOLERANCE = 0.01;
export const DEFAULT_RATE_TOLERANCE = 1e-4;
export const DEFAULT_SEQUENCE_TOLERANCE = 1e-10;

export const SolverOptionsSchema = z.object({
  interestRate: z.number().finite(),
  periods: z.number().int().min(1),
  // 0 = ordinary (end of period), 1 = due (start of period)
  timing: z.union([z.literal(0), z.literal(1)]),
  tolerance: z.number().finite().min(0).default(DEFAULT_CACHE_TOLERANCE),
});

export type SolverOptions = z.infer<typeof SolverOptionsSchema>;

export function parseSolverOptions(input: UniformSeriesOptions): SolverOptions {
  const parsed = SolverOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const fields = Object.keys(fieldErrors).join(", ");
    throw new ValidationError(`Invalid uniform series options: ${fields}`, fieldErrors);
  }
  return parsed.data;
}
