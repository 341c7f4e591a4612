import type { FastifyInstance } from "fastify";
import { h256Schema } from "../ledger/schemas";
import type { LedgerNode } from "../node";
import { outputJson, sendInvalidBody } from "./serialize";

export async function registerBalanceRoutes(app: FastifyInstance, node: LedgerNode) {
  app.get<{ Params: { ownerKey: string } }>('/balance/:ownerKey', async (request, reply) => {
    const parsed = h256Schema.safeParse(request.params.ownerKey);
    if (!parsed.success) {
      return sendInvalidBody(reply, parsed.error);
    }
    return { ownerKey: parsed.data, balance: node.balanceOf(parsed.data).toString() };
  });

  app.get<{ Params: { id: string } }>('/utxos/:id', async (request, reply) => {
    const parsed = h256Schema.safeParse(request.params.id);
    if (!parsed.success) {
      return sendInvalidBody(reply, parsed.error);
    }
    const output = node.getUtxo(parsed.data);
    if (!output) {
      return reply.status(404).send({ error: `UTXO not found: ${parsed.data}` });
    }
    return { id: parsed.data, ...outputJson(output) };
  });

  app.get('/reward-pool', async () => {
    return { rewardPool: node.rewardPool.toString() };
  });
}
