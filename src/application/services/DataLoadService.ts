import type { RawCard } from '../../domain/entities/RawCard.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { deriveTransactions } from '../../domain/services/TransactionDeriver.js';
import type { CardSourcePort } from '../ports/CardSourcePort.js';

export interface LoadedDataset {
  cards: RawCard[];
  transactions: Transaction[];
}

export class DataLoadService {
  constructor(private readonly source: CardSourcePort) {}

  async load(now: Date = new Date()): Promise<LoadedDataset> {
    console.log(`📥 Loading card records from ${this.source.location}`);

    const cards = await this.source.loadCards();
    const transactions = deriveTransactions(cards, now);

    console.log(`✅ Derived ${transactions.length} transactions from ${cards.length} cards`);

    return { cards, transactions };
  }
}
