import type { FastifyInstance } from "fastify";
import { rollbackQuerySchema } from "../ledger/schemas";
import type { LedgerNode } from "../node";
import { sendFailure } from "./serialize";

export async function registerRollbackRoutes(app: FastifyInstance, node: LedgerNode) {
  app.post('/rollback', async (request, reply) => {
    const parsed = rollbackQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid height parameter' });
    }

    try {
      await node.rollback(parsed.data.height);
      return {
        status: 'Rollback successful',
        height: node.currentHeight,
        rewardPool: node.rewardPool.toString(),
      };
    } catch (error) {
      return sendFailure(app.log, reply, error, 'Rollback failed');
    }
  });
}
