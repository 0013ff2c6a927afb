import dayjs from 'dayjs';
import { DataSourceError } from '../errors/DataSourceError.js';
import type { RawCard } from '../entities/RawCard.js';
import type { Transaction, TransactionType } from '../entities/Transaction.js';
import { roundTo } from './AmountRounding.js';
import { parseCreditLimit } from './CreditLimitParser.js';

const HISTORY_WINDOW_DAYS = 730;
const RECIPIENT_SPACE = 10_000;

export const DATE_FORMAT = 'YYYY-MM-DD';
export const TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSS';

export const transactionCountForCard = (cardId: number): number => 3 + (cardId % 3);

export const resolveTransactionType = (cardType: string): TransactionType => {
  const normalized = cardType.toLowerCase();

  if (normalized.includes('debit')) {
    return 'PURCHASE';
  }

  if (normalized.includes('credit')) {
    return 'PAYMENT';
  }

  return 'TRANSFER';
};

export const resolveRecipientId = (clientId: number, index: number): number => {
  const recipientId = (clientId + 100 + index) % RECIPIENT_SPACE;
  return recipientId === clientId ? (recipientId + 1) % RECIPIENT_SPACE : recipientId;
};

export const deriveCardTransactions = (card: RawCard, now: Date): Transaction[] => {
  const creditLimit = parseCreditLimit(card.creditLimit);
  const amountMultiplier = 0.001 + (card.id % 50) / 1000;
  const amount = roundTo(creditLimit * amountMultiplier, 2);
  const type = resolveTransactionType(card.cardType);
  const count = transactionCountForCard(card.id);

  const transactions: Transaction[] = [];

  for (let i = 0; i < count; i += 1) {
    const daysAgo = (card.id * 7 + i * 3) % HISTORY_WINDOW_DAYS;
    const occurredAt = dayjs(now).subtract(daysAgo, 'day');

    transactions.push({
      id: card.id * 100 + i,
      clientId: card.clientId,
      recipientId: resolveRecipientId(card.clientId, i),
      amount,
      type,
      date: occurredAt.format(DATE_FORMAT),
      timestamp: occurredAt.format(TIMESTAMP_FORMAT),
      cardId: card.id,
      cardBrand: card.cardBrand,
      status: i % 10 === 0 ? 'PENDING' : 'COMPLETED',
      description: `Transaction ${i + 1} for card ${card.id}`,
    });
  }

  return transactions;
};

/**
 * Expands every card into 3-5 synthetic transactions. `now` is captured once
 * for the whole run so that re-deriving with the same instant is identical.
 */
export const deriveTransactions = (cards: readonly RawCard[], now: Date = new Date()): Transaction[] => {
  if (cards.length === 0) {
    throw new DataSourceError('SOURCE_EMPTY', 'No card records to derive transactions from');
  }

  const seen = new Set<number>();
  const transactions: Transaction[] = [];

  for (const card of cards) {
    for (const txn of deriveCardTransactions(card, now)) {
      if (seen.has(txn.id)) {
        throw new DataSourceError('SOURCE_INVALID', `Duplicate transaction id ${txn.id} derived from card ${card.id}`);
      }

      seen.add(txn.id);
      transactions.push(txn);
    }
  }

  return transactions;
};
