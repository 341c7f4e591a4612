import type { FastifyInstance } from "fastify";
import { transactionSchema } from "../ledger/schemas";
import type { PoolEntry } from "../ledger/txpool";
import type { LedgerNode } from "../node";
import { sendInvalidBody, verdictJson } from "./serialize";

function entryJson(entry: PoolEntry) {
  return { hash: entry.hash, ...verdictJson(entry.verdict) };
}

export async function registerTransactionRoutes(app: FastifyInstance, node: LedgerNode) {
  app.post('/transactions', async (request, reply) => {
    const parsed = transactionSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidBody(reply, parsed.error);
    }

    const submission = node.submitTransaction(parsed.data);
    switch (submission.status) {
      case 'Rejected':
        return reply.status(400).send({ error: submission.verdict.error, hash: submission.hash });
      case 'PoolFull':
        return reply.status(503).send({ error: 'Transaction pool is full', hash: submission.hash });
      case 'AlreadyImported':
        return { result: submission.status, ...entryJson(submission.entry) };
      case 'Imported':
        return { result: submission.status, ...entryJson(submission.entry), evicted: submission.evicted ?? null };
    }
  });

  app.get('/transactions/pool', async () => {
    const ready = node.pool.readyQueue();
    const readyHashes = new Set(ready.map((entry) => entry.hash));
    const waiting = node.pool.entries().filter((entry) => !readyHashes.has(entry.hash));
    return {
      size: node.pool.size,
      ready: ready.map(entryJson),
      waiting: waiting.map(entryJson),
    };
  });
}
