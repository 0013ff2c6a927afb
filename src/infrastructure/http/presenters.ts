import type { Customer, CustomerSummary } from '../../domain/entities/Customer.js';
import type { FraudByType, FraudPrediction, FraudSummary } from '../../domain/entities/FraudAssessment.js';
import type { AmountDistribution, DailyStats, StatsByType, StatsOverview } from '../../domain/entities/Statistics.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import type { PaginatedResult } from '../../application/dto/TransactionQueryDTO.js';
import type { SystemHealth, SystemMetadata } from '../../application/services/SystemService.js';

// Wire format is snake_case; absent optionals are sent as null.

export const presentTransaction = (txn: Transaction) => ({
  id: txn.id,
  client_id: txn.clientId,
  recipient_id: txn.recipientId ?? null,
  amount: txn.amount,
  type: txn.type,
  date: txn.date,
  timestamp: txn.timestamp,
  card_id: txn.cardId,
  card_brand: txn.cardBrand,
  status: txn.status,
  description: txn.description ?? null,
});

export const presentPage = (page: PaginatedResult<Transaction>) => ({
  items: page.items.map(presentTransaction),
  total: page.total,
  page: page.page,
  page_size: page.pageSize,
  total_pages: page.totalPages,
});

export const presentCustomerSummary = (customer: CustomerSummary) => ({
  id: customer.id,
  total_transactions: customer.totalTransactions,
  total_amount: customer.totalAmount,
  average_amount: customer.averageAmount,
});

export const presentCustomer = (customer: Customer) => ({
  ...presentCustomerSummary(customer),
  cards_count: customer.cardsCount,
});

export const presentOverview = (overview: StatsOverview) => ({
  total_transactions: overview.totalTransactions,
  total_amount: overview.totalAmount,
  average_amount: overview.averageAmount,
  min_amount: overview.minAmount,
  max_amount: overview.maxAmount,
  unique_customers: overview.uniqueCustomers,
  transactions_by_status: overview.transactionsByStatus,
});

export const presentAmountDistribution = (bucket: AmountDistribution) => ({
  range: bucket.range,
  count: bucket.count,
  percentage: bucket.percentage,
});

export const presentStatsByType = (stats: StatsByType) => ({
  type: stats.type,
  count: stats.count,
  total_amount: stats.totalAmount,
  average_amount: stats.averageAmount,
  percentage: stats.percentage,
});

export const presentDailyStats = (stats: DailyStats) => ({
  date: stats.date,
  count: stats.count,
  total_amount: stats.totalAmount,
  average_amount: stats.averageAmount,
});

export const presentFraudSummary = (summary: FraudSummary) => ({
  total_suspicious: summary.totalSuspicious,
  total_flagged: summary.totalFlagged,
  fraud_rate: summary.fraudRate,
  total_amount_at_risk: summary.totalAmountAtRisk,
});

export const presentFraudByType = (entry: FraudByType) => ({
  type: entry.type,
  suspicious_count: entry.suspiciousCount,
  flagged_count: entry.flaggedCount,
  total_amount: entry.totalAmount,
});

export const presentFraudPrediction = (prediction: FraudPrediction) => ({
  is_suspicious: prediction.isSuspicious,
  risk_score: prediction.riskScore,
  reasons: prediction.reasons,
  confidence: prediction.confidence,
});

export const presentHealth = (health: SystemHealth) => ({
  status: health.status,
  timestamp: health.timestamp,
  data_loaded: health.dataLoaded,
  transactions_count: health.transactionsCount,
});

export const presentMetadata = (metadata: SystemMetadata) => ({
  version: metadata.version,
  environment: metadata.environment,
  total_transactions: metadata.totalTransactions,
  total_customers: metadata.totalCustomers,
  data_source: metadata.dataSource,
  last_updated: metadata.lastUpdated,
});
