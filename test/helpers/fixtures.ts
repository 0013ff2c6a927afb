import type { RawCard } from '../../src/domain/entities/RawCard.js';
import type { Transaction } from '../../src/domain/entities/Transaction.js';
import type { CardSourcePort } from '../../src/application/ports/CardSourcePort.js';

export const makeTransaction = (overrides: Partial<Transaction> & Pick<Transaction, 'id'>): Transaction => {
  const transaction: Transaction = {
    clientId: 1,
    recipientId: 100,
    amount: 10,
    type: 'PURCHASE',
    date: '2024-01-01',
    timestamp: '',
    cardId: 1,
    cardBrand: 'Visa',
    status: 'COMPLETED',
    description: `Transaction ${overrides.id}`,
    ...overrides,
  };

  return { ...transaction, timestamp: transaction.timestamp || `${transaction.date}T09:30:00.000` };
};

/**
 * Five transactions, listed in derivation order. Date-descending order is
 * ids 5, 2, 3, 1, 4 (2 and 3 share a date).
 */
export const sampleTransactions = (): Transaction[] => [
  makeTransaction({ id: 1, date: '2024-03-01', type: 'PURCHASE', amount: 50, clientId: 1, recipientId: 101, description: 'Coffee shop' }),
  makeTransaction({ id: 2, date: '2024-03-05', type: 'PAYMENT', amount: 250, clientId: 2, recipientId: 102, status: 'PENDING', description: 'Card payment' }),
  makeTransaction({ id: 3, date: '2024-03-05', type: 'TRANSFER', amount: 1200, clientId: 1, recipientId: 102, description: 'Rent transfer' }),
  makeTransaction({ id: 4, date: '2024-02-20', type: 'PURCHASE', amount: 75.5, clientId: 3, recipientId: 101, description: undefined }),
  makeTransaction({ id: 5, date: '2024-03-10', type: 'PAYMENT', amount: 0, clientId: 0, recipientId: 104, description: 'Zero payment' }),
];

export const sampleCards = (): RawCard[] => [
  { id: 10, clientId: 5, creditLimit: '$2,000.00', cardType: 'Credit', cardBrand: 'Visa' },
  { id: 21, clientId: 7, creditLimit: '$500', cardType: 'Debit', cardBrand: 'Mastercard' },
];

export class InMemoryCardSource implements CardSourcePort {
  readonly location = 'memory://cards';

  constructor(private readonly cards: RawCard[]) {}

  async loadCards(): Promise<RawCard[]> {
    return [...this.cards];
  }
}
