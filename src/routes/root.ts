import type { FastifyInstance } from "fastify";
import type { LedgerNode } from "../node";

export async function registerRootRoutes(app: FastifyInstance, node: LedgerNode) {
  app.get('/', async (_request, _reply) => {
    return { welcome: 'in ledger', currentHeight: node.currentHeight };
  });
}
