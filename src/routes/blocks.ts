import type { FastifyInstance } from "fastify";
import { blockSchema } from "../ledger/schemas";
import type { LedgerNode } from "../node";
import { distributionJson, sendFailure, sendInvalidBody } from "./serialize";

export async function registerBlocksRoutes(app: FastifyInstance, node: LedgerNode) {
  app.post('/blocks', async (request, reply) => {
    const parsed = blockSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendInvalidBody(reply, parsed.error);
    }

    try {
      const receipt = await node.importBlock(parsed.data);
      return {
        status: 'Block accepted',
        height: receipt.header.height,
        id: receipt.header.id,
        transactions: receipt.transactions,
        distribution: distributionJson(receipt.distribution),
        droppedFromPool: receipt.droppedFromPool,
        rewardPool: node.rewardPool.toString(),
      };
    } catch (error) {
      return sendFailure(app.log, reply, error, 'Block import failed');
    }
  });

  app.get('/blocks', async () => {
    const blocks = node.blocks;
    return { blocks, count: blocks.length, currentHeight: node.currentHeight };
  });
}
