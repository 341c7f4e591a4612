import Fastify, { type FastifyBaseLogger } from 'fastify';
import type { LedgerNode } from './node';
import { registerRootRoutes } from './routes/root';
import { registerBlocksRoutes } from './routes/blocks';
import { registerTransactionRoutes } from './routes/transactions';
import { registerBalanceRoutes } from './routes/balance';
import { registerRollbackRoutes } from './routes/rollback';
import { registerResetRoutes } from './routes/reset';

export async function buildApp(node: LedgerNode, logger: FastifyBaseLogger) {
  const fastify = Fastify({ logger });

  await registerRootRoutes(fastify, node);
  await registerBlocksRoutes(fastify, node);
  await registerTransactionRoutes(fastify, node);
  await registerBalanceRoutes(fastify, node);
  await registerRollbackRoutes(fastify, node);
  await registerResetRoutes(fastify, node);

  return fastify;
}
