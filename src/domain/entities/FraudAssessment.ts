export interface FraudSummary {
  totalSuspicious: number;
  totalFlagged: number;
  fraudRate: number;
  totalAmountAtRisk: number;
}

export interface FraudByType {
  type: string;
  suspiciousCount: number;
  flaggedCount: number;
  totalAmount: number;
}

export interface FraudPrediction {
  isSuspicious: boolean;
  riskScore: number; // 0-100
  reasons: string[];
  confidence: number; // 0-100
}
