import { z } from 'zod';
import { AmountInputSchema, IntegerInputSchema, boundedInteger } from './NumericInput.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date formatted YYYY-MM-DD');

export const TransactionIdSchema = IntegerInputSchema;

export const TransactionFiltersSchema = z.object({
  type: z.string().min(1).nullish(),
  clientId: IntegerInputSchema.nullish(),
  recipientId: IntegerInputSchema.nullish(),
  minAmount: AmountInputSchema.nullish(),
  maxAmount: AmountInputSchema.nullish(),
  startDate: isoDate.nullish(),
  endDate: isoDate.nullish(),
  status: z.string().min(1).nullish(),
});

export type TransactionFiltersDTO = z.infer<typeof TransactionFiltersSchema>;

export const PaginationSchema = z.object({
  page: boundedInteger(1).default(1),
  pageSize: boundedInteger(1, 100).default(10),
});

export type PaginationDTO = z.infer<typeof PaginationSchema>;

export const TransactionListQuerySchema = z.object({
  filters: TransactionFiltersSchema.default({}),
  pagination: PaginationSchema.default({}),
});

export type TransactionListQueryInput = z.input<typeof TransactionListQuerySchema>;

export const TransactionSearchSchema = z.object({
  query: z.string().min(1, 'Search query must not be empty'),
  filters: TransactionFiltersSchema.nullish(),
  pagination: PaginationSchema.nullish(),
});

export type TransactionSearchInput = z.input<typeof TransactionSearchSchema>;

export const RecentTransactionsSchema = z.object({
  limit: boundedInteger(1, 100).default(10),
});

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
