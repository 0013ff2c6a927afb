import { z } from 'zod';

export const FraudPredictionRequestSchema = z.object({
  transactionId: z.number().int().nullish(),
  amount: z.number().min(0),
  clientId: z.number().int(),
  transactionType: z.string().min(1),
  recipientId: z.number().int().nullish(),
});

export type FraudPredictionRequestDTO = z.infer<typeof FraudPredictionRequestSchema>;
export type FraudPredictionRequestInput = z.input<typeof FraudPredictionRequestSchema>;
