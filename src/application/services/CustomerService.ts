import type { Customer, CustomerSummary } from '../../domain/entities/Customer.js';
import type { RawCard } from '../../domain/entities/RawCard.js';
import { CustomerIdSchema, TopCustomersQuerySchema } from '../dto/CustomerQueryDTO.js';
import type { TopCustomersQueryInput } from '../dto/CustomerQueryDTO.js';
import { parseInput } from '../dto/parseInput.js';
import type { TransactionStorePort } from '../ports/TransactionStorePort.js';

export class CustomerService {
  private readonly cardCounts = new Map<number, number>();

  constructor(
    private readonly store: TransactionStorePort,
    cards: readonly RawCard[],
  ) {
    cards.forEach((card) => this.cardCounts.set(card.clientId, (this.cardCounts.get(card.clientId) ?? 0) + 1));
  }

  getCustomers(): Customer[] {
    const totals = new Map<number, { count: number; amount: number }>();

    for (const txn of this.store.visibleTransactions()) {
      const entry = totals.get(txn.clientId) ?? { count: 0, amount: 0 };
      entry.count += 1;
      entry.amount += txn.amount;
      totals.set(txn.clientId, entry);
    }

    return Array.from(totals.entries())
      .map(([id, entry]) => ({
        id,
        totalTransactions: entry.count,
        totalAmount: entry.amount,
        averageAmount: entry.amount / entry.count,
        cardsCount: this.cardCounts.get(id) ?? 0,
      }))
      .sort((a, b) => a.id - b.id);
  }

  getCustomerById(customerId: number): Customer | null {
    const id = parseInput(CustomerIdSchema, customerId);
    return this.getCustomers().find((customer) => customer.id === id) ?? null;
  }

  getTopCustomers(input: TopCustomersQueryInput = {}): CustomerSummary[] {
    const { limit, sortBy } = parseInput(TopCustomersQuerySchema, input);

    const ranked = this.getCustomers().sort((a, b) =>
      sortBy === 'total_transactions' ? b.totalTransactions - a.totalTransactions : b.totalAmount - a.totalAmount,
    );

    return ranked.slice(0, limit).map(({ id, totalTransactions, totalAmount, averageAmount }) => ({
      id,
      totalTransactions,
      totalAmount,
      averageAmount,
    }));
  }
}
