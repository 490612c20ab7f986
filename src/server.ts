import 'dotenv/config';
import express from 'express';
import { pool, withTransaction } from './db';
import { getSalesPolicy } from './config/salesPolicy';
import { createPgSalesStore, type TransactionRunner } from './domains/sales';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createHealthRouter } from './routes/health.routes';
import { createSalesRouter } from './routes/sales.routes';
import { createOrdersRouter } from './routes/orders.routes';
import { createReportsRouter } from './routes/reports.routes';

const PORT = Number(process.env.PORT) || 3000;

const policy = getSalesPolicy();
const runInTransaction: TransactionRunner = (handler) =>
  withTransaction(handler, { lockTimeoutMs: policy.lockTimeoutMs });
const store = createPgSalesStore(runInTransaction);

const app = express();
app.use(express.json());
app.use(requestContextMiddleware);
app.use(requestLoggerMiddleware);

app.use(createHealthRouter(pool));
app.use(createSalesRouter({ store, policy, executor: pool }));
app.use(createOrdersRouter({ store, policy }));
app.use(createReportsRouter({ executor: pool, deferredCategory: policy.deferredCategory }));

app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

pool.on('error', (err) => {
  console.error('Unexpected DB pool error', err);
});

app.listen(PORT, () => {
  console.log(`POS order ledger API listening on port ${PORT}`);
});
