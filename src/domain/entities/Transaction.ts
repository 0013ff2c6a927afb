export type TransactionType = 'PURCHASE' | 'PAYMENT' | 'TRANSFER';

export type TransactionStatus = 'COMPLETED' | 'PENDING';

export interface Transaction {
  id: number;
  clientId: number;
  recipientId?: number;
  amount: number;
  type: TransactionType;
  date: string; // YYYY-MM-DD
  timestamp: string; // local ISO timestamp, same day as date
  cardId: number;
  cardBrand: string;
  status: TransactionStatus;
  description?: string;
}
