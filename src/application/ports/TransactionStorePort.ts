import type { Transaction } from '../../domain/entities/Transaction.js';

export interface TransactionStorePort {
  allTransactions(): readonly Transaction[];
  visibleTransactions(): Transaction[];
  findById(id: number): Transaction | null;
  isVisible(id: number): boolean;
  markDeleted(id: number): boolean;
  resetDeletions(): void;
  size(): number;
}
