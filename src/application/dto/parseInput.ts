import type { z } from 'zod';
import { ValidationError } from '../errors/ValidationError.js';

export const parseInput = <Schema extends z.ZodTypeAny>(schema: Schema, input: unknown): z.output<Schema> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }

  return result.data;
};
