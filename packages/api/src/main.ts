import { fileURLToPath } from 'node:url';
import {
  createLogger,
  createPool,
  loadRulesFromFile,
  runMigrations,
  setLogLevel,
  PgIdentityResolver,
  PgProcurementStore,
  ProcurementService,
} from '@requisition/core';
import { createIntentPipeline } from '@requisition/intent';
import { loadConfig } from './config.js';
import { createServer } from './server.js';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const logger = createLogger('api');

  const pool = createPool(config.database);

  const migrationsDir = fileURLToPath(new URL('../../../migrations', import.meta.url));
  await runMigrations(pool, migrationsDir);

  const extraRules = config.rulesFile ? loadRulesFromFile(config.rulesFile) : [];

  const service = new ProcurementService(new PgProcurementStore(pool), new PgIdentityResolver(pool), {
    extraRules,
    receiptTolerance: config.receiptTolerance,
    poPrefix: config.poNumberPrefix,
    poGenerationTimeoutMs: config.poGenerationTimeoutMs,
  });

  const intentPipeline = createIntentPipeline(service);
  const server = createServer({
    service,
    intentPipeline,
    jwtSecret: config.jwtSecret,
    logLevel: config.logLevel,
    checkDatabase: async () => {
      await pool.query('SELECT 1');
    },
  });

  await server.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(
    { port: config.port, auth: config.jwtSecret ? 'jwt' : 'disabled', intents: intentPipeline.intentTypes() },
    'requisition API listening',
  );

  const shutdown = async () => {
    await server.close();
    await pool.end();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  createLogger('api').fatal({ err }, 'failed to start server');
  process.exit(1);
});
