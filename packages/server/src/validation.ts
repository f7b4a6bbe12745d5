import type { z } from 'zod';
import { ValidationError } from 'mendgraph-core';

/**
 * Parse a request body or query with a Zod schema.
 * @throws {ValidationError} listing every failing path
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what = 'request'): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
