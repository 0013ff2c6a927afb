import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { CustomerIdSchema, TopCustomersQuerySchema } from './application/dto/CustomerQueryDTO.js';
import { FraudPredictionRequestSchema } from './application/dto/FraudPredictionRequestDTO.js';
import {
  TransactionIdSchema,
  TransactionListQuerySchema,
  TransactionSearchSchema,
  RecentTransactionsSchema,
} from './application/dto/TransactionQueryDTO.js';
import { parseInput } from './application/dto/parseInput.js';
import { ValidationError } from './application/errors/ValidationError.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import {
  presentAmountDistribution,
  presentCustomer,
  presentCustomerSummary,
  presentDailyStats,
  presentFraudByType,
  presentFraudPrediction,
  presentFraudSummary,
  presentHealth,
  presentMetadata,
  presentOverview,
  presentPage,
  presentStatsByType,
  presentTransaction,
} from './infrastructure/http/presenters.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asRecord = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

// Nested body sections that are not objects are passed on as-is so that
// validation rejects them.
const readSection = (value: unknown, read: (source: Record<string, unknown>) => object): unknown =>
  isRecord(value) ? read(value) : value;

// Empty query parameters (`?client_id=`) mean "not given".
const queryParam = (value: unknown): unknown => (value === '' ? undefined : value);

const readFilters = (source: Record<string, unknown>) => ({
  type: queryParam(source.type),
  clientId: queryParam(source.client_id),
  recipientId: queryParam(source.recipient_id),
  minAmount: queryParam(source.min_amount),
  maxAmount: queryParam(source.max_amount),
  startDate: queryParam(source.start_date),
  endDate: queryParam(source.end_date),
  status: queryParam(source.status),
});

const readPagination = (source: Record<string, unknown>) => ({
  page: queryParam(source.page),
  pageSize: queryParam(source.page_size),
});

const notFound = (res: Response, what: string) => res.status(404).json({ error: `${what} not found` });

export const createServer = (container: AppContainer) => {
  const app = express();
  const { transactionQuery, statsService, fraudDetection, customerService, systemService } = container;

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (req, res) => {
    res.json({
      name: container.config.app.title,
      version: container.config.app.version,
      status: 'running',
      endpoints: {
        transactions: 'GET /api/transactions',
        search: 'POST /api/transactions/search',
        stats: 'GET /api/stats/overview',
        fraud: 'GET /api/fraud/summary',
        customers: 'GET /api/customers',
        health: 'GET /api/system/health',
      },
    });
  });

  // Transactions. Fixed paths are registered before `/:id`.

  app.get('/api/transactions', (req, res) => {
    const query = asRecord(req.query);
    const input = parseInput(TransactionListQuerySchema, {
      filters: readFilters(query),
      pagination: readPagination(query),
    });

    res.json(presentPage(transactionQuery.listTransactions(input)));
  });

  app.post('/api/transactions/search', (req, res) => {
    const body = asRecord(req.body);
    const input = parseInput(TransactionSearchSchema, {
      query: body.query,
      filters: readSection(body.filters, readFilters),
      pagination: readSection(body.pagination, readPagination),
    });

    res.json(presentPage(transactionQuery.searchTransactions(input)));
  });

  app.get('/api/transactions/types', (req, res) => {
    res.json(transactionQuery.getTransactionTypes());
  });

  app.get('/api/transactions/recent', (req, res) => {
    const { limit } = parseInput(RecentTransactionsSchema, { limit: queryParam(req.query.limit) });
    res.json(transactionQuery.getRecentTransactions(limit).map(presentTransaction));
  });

  app.get('/api/transactions/by-customer/:customerId', (req, res) => {
    const customerId = parseInput(CustomerIdSchema, req.params.customerId);
    res.json(transactionQuery.getTransactionsByCustomer(customerId).map(presentTransaction));
  });

  app.get('/api/transactions/to-customer/:customerId', (req, res) => {
    const customerId = parseInput(CustomerIdSchema, req.params.customerId);
    res.json(transactionQuery.getTransactionsToCustomer(customerId).map(presentTransaction));
  });

  app.get('/api/transactions/:id', (req, res) => {
    const transaction = transactionQuery.getTransactionById(parseInput(TransactionIdSchema, req.params.id));

    if (!transaction) {
      return notFound(res, 'Transaction');
    }

    return res.json(presentTransaction(transaction));
  });

  app.delete('/api/transactions/:id', (req, res) => {
    const id = parseInput(TransactionIdSchema, req.params.id);

    if (!transactionQuery.removeTransaction(id)) {
      return notFound(res, 'Transaction');
    }

    return res.json({ message: 'Transaction deleted successfully', id });
  });

  // Statistics

  app.get('/api/stats/overview', (req, res) => {
    res.json(presentOverview(statsService.getOverview()));
  });

  app.get('/api/stats/amount-distribution', (req, res) => {
    res.json(statsService.getAmountDistribution().map(presentAmountDistribution));
  });

  app.get('/api/stats/by-type', (req, res) => {
    res.json(statsService.getStatsByType().map(presentStatsByType));
  });

  app.get('/api/stats/daily', (req, res) => {
    res.json(statsService.getDailyStats().map(presentDailyStats));
  });

  // Fraud

  app.get('/api/fraud/summary', (req, res) => {
    res.json(presentFraudSummary(fraudDetection.getFraudSummary()));
  });

  app.get('/api/fraud/by-type', (req, res) => {
    res.json(fraudDetection.getFraudByType().map(presentFraudByType));
  });

  app.post('/api/fraud/predict', (req, res) => {
    const body = asRecord(req.body);
    const request = parseInput(FraudPredictionRequestSchema, {
      transactionId: body.transaction_id,
      amount: body.amount,
      clientId: body.client_id,
      transactionType: body.transaction_type,
      recipientId: body.recipient_id,
    });

    res.json(presentFraudPrediction(fraudDetection.predictFraud(request)));
  });

  // Customers

  app.get('/api/customers', (req, res) => {
    res.json(customerService.getCustomers().map(presentCustomer));
  });

  app.get('/api/customers/top', (req, res) => {
    const query = parseInput(TopCustomersQuerySchema, {
      limit: queryParam(req.query.limit),
      sortBy: queryParam(req.query.sort_by),
    });

    res.json(customerService.getTopCustomers(query).map(presentCustomerSummary));
  });

  app.get('/api/customers/:id', (req, res) => {
    const customer = customerService.getCustomerById(parseInput(CustomerIdSchema, req.params.id));

    if (!customer) {
      return notFound(res, 'Customer');
    }

    return res.json(presentCustomer(customer));
  });

  // System

  app.get('/api/system/health', (req, res) => {
    res.json(presentHealth(systemService.getHealth()));
  });

  app.get('/api/system/metadata', (req, res) => {
    res.json(presentMetadata(systemService.getMetadata()));
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }

    if (error instanceof ValidationError) {
      return res.status(422).json({ error: error.message, issues: error.issues });
    }

    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }

    const message = error instanceof Error ? error.message : 'Unexpected error';
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
    return res.status(500).json({ error: message });
  });

  return app;
};
