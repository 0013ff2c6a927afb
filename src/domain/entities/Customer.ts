export interface CustomerSummary {
  id: number;
  totalTransactions: number;
  totalAmount: number;
  averageAmount: number;
}

export interface Customer extends CustomerSummary {
  cardsCount: number;
}
