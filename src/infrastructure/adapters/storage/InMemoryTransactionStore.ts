import type { Transaction } from '../../../domain/entities/Transaction.js';
import type { TransactionStorePort } from '../../../application/ports/TransactionStorePort.js';

/**
 * Derived transactions are fixed for the life of the process; the only
 * mutable state is the set of soft-deleted ids.
 */
export class InMemoryTransactionStore implements TransactionStorePort {
  private readonly transactions: readonly Transaction[];
  private readonly byId = new Map<number, Transaction>();
  private readonly deletedIds = new Set<number>();

  constructor(transactions: readonly Transaction[]) {
    this.transactions = Object.freeze([...transactions]);
    for (const txn of this.transactions) {
      this.byId.set(txn.id, txn);
    }
  }

  allTransactions(): readonly Transaction[] {
    return this.transactions;
  }

  visibleTransactions(): Transaction[] {
    if (this.deletedIds.size === 0) {
      return [...this.transactions];
    }

    return this.transactions.filter((txn) => !this.deletedIds.has(txn.id));
  }

  findById(id: number): Transaction | null {
    return this.byId.get(id) ?? null;
  }

  isVisible(id: number): boolean {
    return this.byId.has(id) && !this.deletedIds.has(id);
  }

  markDeleted(id: number): boolean {
    if (!this.byId.has(id) || this.deletedIds.has(id)) {
      return false;
    }

    this.deletedIds.add(id);
    console.log(`🗑️ Marked transaction ${id} as deleted (${this.deletedIds.size} hidden)`);
    return true;
  }

  resetDeletions(): void {
    this.deletedIds.clear();
  }

  size(): number {
    return this.transactions.length;
  }
}
