import type { FastifyInstance } from "fastify";
import type { LedgerNode } from "../node";
import { sendFailure } from "./serialize";

export async function registerResetRoutes(app: FastifyInstance, node: LedgerNode) {
  app.post('/reset', async (_request, reply) => {
    try {
      await node.reset();

      return {
        status: 'Reset successful',
        currentHeight: node.currentHeight,
        blocksCount: node.blocks.length,
        utxosCount: node.utxoCount,
        poolSize: node.pool.size,
      };
    } catch (error) {
      return sendFailure(app.log, reply, error, 'Reset failed');
    }
  });
}
