import { buildApp } from './app';
import { loadConfig } from './config';
import { closeDb, getDbPool, initDb } from './db/pool';
import { PgLedgerRepository } from './db/repository';
import { loadGenesisFile } from './ledger/genesis';
import { createLogger } from './logger';
import { LedgerNode } from './node';

const logger = createLogger();

try {
  const config = loadConfig();
  logger.level = config.logLevel;

  const genesis = await loadGenesisFile(config.genesisFile);
  await initDb(config.databaseUrl);

  const node = new LedgerNode({
    repository: new PgLedgerRepository(getDbPool()),
    genesis,
    logger,
    poolCapacity: config.poolCapacity,
  });
  await node.start();

  const fastify = await buildApp(node, logger);
  fastify.addHook('onClose', async () => {
    await closeDb();
  });

  await fastify.listen({ port: config.port, host: config.host });
} catch (err) {
  logger.fatal({ err }, 'Startup failed');
  await closeDb();
  process.exit(1);
}
