import type { Transaction } from '../../domain/entities/Transaction.js';
import {
  PaginationSchema,
  RecentTransactionsSchema,
  TransactionIdSchema,
  TransactionListQuerySchema,
  TransactionSearchSchema,
} from '../dto/TransactionQueryDTO.js';
import type {
  PaginatedResult,
  PaginationDTO,
  TransactionFiltersDTO,
  TransactionListQueryInput,
  TransactionSearchInput,
} from '../dto/TransactionQueryDTO.js';
import { parseInput } from '../dto/parseInput.js';
import type { TransactionStorePort } from '../ports/TransactionStorePort.js';

const isPresent = <T>(value: T | null | undefined): value is T => value !== null && value !== undefined;

export const matchesFilters = (txn: Transaction, filters: TransactionFiltersDTO): boolean => {
  if (isPresent(filters.type) && txn.type !== filters.type) {
    return false;
  }
  if (isPresent(filters.clientId) && txn.clientId !== filters.clientId) {
    return false;
  }
  if (isPresent(filters.recipientId) && txn.recipientId !== filters.recipientId) {
    return false;
  }
  if (isPresent(filters.minAmount) && txn.amount < filters.minAmount) {
    return false;
  }
  if (isPresent(filters.maxAmount) && txn.amount > filters.maxAmount) {
    return false;
  }
  if (isPresent(filters.startDate) && txn.date < filters.startDate) {
    return false;
  }
  if (isPresent(filters.endDate) && txn.date > filters.endDate) {
    return false;
  }
  if (isPresent(filters.status) && txn.status !== filters.status) {
    return false;
  }

  return true;
};

export const matchesQuery = (txn: Transaction, query: string): boolean => {
  const needle = query.toLowerCase();
  const inDescription = txn.description !== undefined && txn.description.toLowerCase().includes(needle);

  return inDescription || txn.type.toLowerCase().includes(needle);
};

// Array.prototype.sort is stable, so equal dates keep derivation order.
export const sortByDateDesc = (transactions: Transaction[]): Transaction[] =>
  [...transactions].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));

export const paginate = <T>(items: T[], pagination: PaginationDTO): PaginatedResult<T> => {
  const { page, pageSize } = pagination;
  const start = (page - 1) * pageSize;

  return {
    items: items.slice(start, start + pageSize),
    total: items.length,
    page,
    pageSize,
    totalPages: Math.ceil(items.length / pageSize),
  };
};

export class TransactionQueryService {
  constructor(private readonly store: TransactionStorePort) {}

  listTransactions(input: TransactionListQueryInput = {}): PaginatedResult<Transaction> {
    const { filters, pagination } = parseInput(TransactionListQuerySchema, input);

    const matching = this.store.visibleTransactions().filter((txn) => matchesFilters(txn, filters));

    return paginate(sortByDateDesc(matching), pagination);
  }

  searchTransactions(input: TransactionSearchInput): PaginatedResult<Transaction> {
    const { query, filters, pagination } = parseInput(TransactionSearchSchema, input);

    const matching = this.store
      .visibleTransactions()
      .filter((txn) => (filters ? matchesFilters(txn, filters) : true))
      .filter((txn) => matchesQuery(txn, query));

    return paginate(sortByDateDesc(matching), pagination ?? PaginationSchema.parse({}));
  }

  getTransactionById(id: number): Transaction | null {
    const transactionId = parseInput(TransactionIdSchema, id);

    if (!this.store.isVisible(transactionId)) {
      return null;
    }

    return this.store.findById(transactionId);
  }

  getTransactionTypes(): string[] {
    const types = new Set(this.store.visibleTransactions().map((txn) => txn.type));
    return Array.from(types).sort();
  }

  getRecentTransactions(limit?: number): Transaction[] {
    const parsed = parseInput(RecentTransactionsSchema, { limit });
    return sortByDateDesc(this.store.visibleTransactions()).slice(0, parsed.limit);
  }

  /** Soft delete. False when the id does not currently resolve to a visible transaction. */
  removeTransaction(id: number): boolean {
    const transaction = this.getTransactionById(id);
    if (!transaction) {
      return false;
    }

    return this.store.markDeleted(transaction.id);
  }

  getTransactionsByCustomer(customerId: number): Transaction[] {
    const clientId = parseInput(TransactionIdSchema, customerId);
    return sortByDateDesc(this.store.visibleTransactions().filter((txn) => txn.clientId === clientId));
  }

  getTransactionsToCustomer(customerId: number): Transaction[] {
    const recipientId = parseInput(TransactionIdSchema, customerId);
    return sortByDateDesc(this.store.visibleTransactions().filter((txn) => txn.recipientId === recipientId));
  }
}
