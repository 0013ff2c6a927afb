import { z } from 'zod';
import { IntegerInputSchema, boundedInteger } from './NumericInput.js';

export const CustomerIdSchema = IntegerInputSchema;

export const TopCustomersQuerySchema = z.object({
  limit: boundedInteger(1, 100).default(10),
  sortBy: z.enum(['total_amount', 'total_transactions']).default('total_amount'),
});

export type TopCustomersQueryInput = z.input<typeof TopCustomersQuerySchema>;
