export interface StatsOverview {
  totalTransactions: number;
  totalAmount: number;
  averageAmount: number;
  minAmount: number;
  maxAmount: number;
  uniqueCustomers: number;
  transactionsByStatus: Record<string, number>;
}

export interface AmountDistribution {
  range: string;
  count: number;
  percentage: number;
}

export interface StatsByType {
  type: string;
  count: number;
  totalAmount: number;
  averageAmount: number;
  percentage: number;
}

export interface DailyStats {
  date: string;
  count: number;
  totalAmount: number;
  averageAmount: number;
}
