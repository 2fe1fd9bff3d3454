import { InvalidInputError } from '@autodialer/domain';
import type { z } from 'zod';

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new InvalidInputError(`${where}${issue?.message ?? 'invalid request'}`);
  }
  return result.data;
}
