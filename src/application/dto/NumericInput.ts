import { z } from 'zod';

// Path and query values arrive as strings, JSON bodies as numbers. Anything
// else (blank strings, booleans, hex, exponents) is rejected.
const integerString = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number);

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'Expected a non-negative number')
  .transform(Number);

export const IntegerInputSchema = z.union([z.number().int(), integerString]);

export const AmountInputSchema = z.union([z.number(), decimalString]).pipe(z.number().min(0));

export const boundedInteger = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  IntegerInputSchema.pipe(z.number().min(min).max(max));
