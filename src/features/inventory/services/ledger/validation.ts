import type { z } from 'zod';
import { LedgerValidationError } from './errors';

/** Validate an operation payload, raising LedgerValidationError with every issue listed */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw LedgerValidationError.fromZod(result.error, context);
  }
  return result.data;
}
