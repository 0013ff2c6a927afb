import type { FraudByType, FraudPrediction, FraudSummary } from '../../domain/entities/FraudAssessment.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { roundTo } from '../../domain/services/AmountRounding.js';
import { percentile } from '../../domain/services/Percentile.js';
import { FraudPredictionRequestSchema } from '../dto/FraudPredictionRequestDTO.js';
import type { FraudPredictionRequestInput } from '../dto/FraudPredictionRequestDTO.js';
import { parseInput } from '../dto/parseInput.js';
import type { TransactionStorePort } from '../ports/TransactionStorePort.js';

export const HIGH_FREQUENCY_CLIENT_COUNT = 50;
export const REPEATED_RECIPIENT_COUNT = 20;
export const LARGE_TRANSFER_AMOUNT = 10_000;
export const FLAGGED_REASON_COUNT = 2;

const NO_REASONS_PLACEHOLDER = 'No suspicious patterns detected';

interface ScoredCandidate {
  amount: number;
  clientId: number;
  recipientId?: number | null;
  type: string;
}

/**
 * Everything the heuristics need from the visible set, computed once per call
 * so that scoring a whole batch stays linear.
 */
interface ScoringContext {
  p95: number;
  p99: number;
  clientCounts: Map<number, number>;
  pairCounts: Map<string, number>;
}

const pairKey = (clientId: number, recipientId: number): string => `${clientId}:${recipientId}`;

const buildContext = (transactions: Transaction[]): ScoringContext => {
  const amounts = transactions.map((txn) => txn.amount);
  const clientCounts = new Map<number, number>();
  const pairCounts = new Map<string, number>();

  for (const txn of transactions) {
    clientCounts.set(txn.clientId, (clientCounts.get(txn.clientId) ?? 0) + 1);

    if (txn.recipientId !== undefined) {
      const key = pairKey(txn.clientId, txn.recipientId);
      pairCounts.set(key, (pairCounts.get(key) ?? 0) + 1);
    }
  }

  // Without a population there is no amount threshold to exceed.
  const threshold = (q: number): number => (amounts.length > 0 ? percentile(amounts, q) : Number.POSITIVE_INFINITY);

  return {
    p95: threshold(0.95),
    p99: threshold(0.99),
    clientCounts,
    pairCounts,
  };
};

export const suspicionReasons = (candidate: ScoredCandidate, context: ScoringContext): string[] => {
  const reasons: string[] = [];

  if (candidate.amount > context.p95) {
    reasons.push(`Amount ${candidate.amount.toFixed(2)} exceeds threshold ${context.p95.toFixed(2)}`);
  }

  if ((context.clientCounts.get(candidate.clientId) ?? 0) > HIGH_FREQUENCY_CLIENT_COUNT) {
    reasons.push('High transaction frequency for this client');
  }

  if (candidate.type === 'TRANSFER' && candidate.amount > LARGE_TRANSFER_AMOUNT) {
    reasons.push('Large transfer transaction');
  }

  if (candidate.recipientId !== undefined && candidate.recipientId !== null) {
    const repeated = context.pairCounts.get(pairKey(candidate.clientId, candidate.recipientId)) ?? 0;
    if (repeated > REPEATED_RECIPIENT_COUNT) {
      reasons.push('Repeated transactions to same recipient');
    }
  }

  return reasons;
};

export class FraudDetectionService {
  constructor(private readonly store: TransactionStorePort) {}

  getFraudSummary(): FraudSummary {
    const transactions = this.store.visibleTransactions();

    if (transactions.length === 0) {
      return { totalSuspicious: 0, totalFlagged: 0, fraudRate: 0, totalAmountAtRisk: 0 };
    }

    const context = buildContext(transactions);
    let suspicious = 0;
    let flagged = 0;
    let amountAtRisk = 0;

    for (const txn of transactions) {
      const reasons = suspicionReasons(txn, context);
      if (reasons.length === 0) {
        continue;
      }

      suspicious += 1;
      if (reasons.length >= FLAGGED_REASON_COUNT) {
        flagged += 1;
        amountAtRisk += txn.amount;
      }
    }

    return {
      totalSuspicious: suspicious,
      totalFlagged: flagged,
      fraudRate: roundTo((suspicious / transactions.length) * 100, 2),
      totalAmountAtRisk: roundTo(amountAtRisk, 2),
    };
  }

  getFraudByType(): FraudByType[] {
    const transactions = this.store.visibleTransactions();

    if (transactions.length === 0) {
      return [];
    }

    const context = buildContext(transactions);
    const byType = new Map<string, FraudByType>();

    for (const txn of transactions) {
      const entry = byType.get(txn.type) ?? { type: txn.type, suspiciousCount: 0, flaggedCount: 0, totalAmount: 0 };
      const reasons = suspicionReasons(txn, context);

      if (reasons.length > 0) {
        entry.suspiciousCount += 1;
      }
      if (reasons.length >= FLAGGED_REASON_COUNT) {
        entry.flaggedCount += 1;
      }
      entry.totalAmount += txn.amount;

      byType.set(txn.type, entry);
    }

    return Array.from(byType.values())
      .map((entry) => ({ ...entry, totalAmount: roundTo(entry.totalAmount, 2) }))
      .sort((a, b) => a.type.localeCompare(b.type))
      .sort((a, b) => b.flaggedCount - a.flaggedCount);
  }

  /**
   * Scores a transaction that need not be stored. The candidate is measured
   * against the visible set as it is and is not added to it.
   */
  predictFraud(input: FraudPredictionRequestInput): FraudPrediction {
    const request = parseInput(FraudPredictionRequestSchema, input);
    const context = buildContext(this.store.visibleTransactions());

    const reasons = suspicionReasons(
      {
        amount: request.amount,
        clientId: request.clientId,
        recipientId: request.recipientId,
        type: request.transactionType,
      },
      context,
    );

    let riskScore = reasons.length * 25;
    if (request.amount > context.p95) {
      riskScore += 20;
    }
    if (request.amount > context.p99) {
      riskScore += 30;
    }

    const confidence = reasons.length > 0 ? Math.min(reasons.length * 30, 100) : 10;

    return {
      isSuspicious: reasons.length > 0,
      riskScore: roundTo(Math.min(riskScore, 100), 2),
      reasons: reasons.length > 0 ? reasons : [NO_REASONS_PLACEHOLDER],
      confidence: roundTo(confidence, 2),
    };
  }
}
