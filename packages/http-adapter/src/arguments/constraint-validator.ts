import type { ConstraintValidator, ConstraintViolation } from './interfaces';
import type { ConstraintSchema } from './types';

/**
 * Evaluates zod schemas against a coerced value. Every issue of every schema is reported.
 */
export class ZodConstraintValidator implements ConstraintValidator {
  validate(value: unknown, constraints: readonly ConstraintSchema[]): readonly ConstraintViolation[] {
    return constraints.flatMap(schema => {
      const result = schema.safeParse(value);

      if (result.success) {
        return [];
      }

      return result.error.issues.map(issue => ({ message: issue.message, code: issue.code }));
    });
  }
}
