import { config, loadBaseApiConfig, setBaseApiConfig } from './config/index.js';
import { connectDatabase } from './databases/connect-database.js';
import { MigrationRunner } from './databases/migrations/migration-runner.js';
import { setupRoutes } from './routes.js';
import { expressUtils } from './utils/express.utils.js';

async function start(): Promise<void> {
  setBaseApiConfig(loadBaseApiConfig());

  const { mongoClient, db, database } = await connectDatabase(config);

  if (db && config.migrations.runOnStartup) {
    await new MigrationRunner(db).run('up');
  }

  const app = expressUtils.setupExpressApp(database, config, setupRoutes);
  const { hostName, externalPort } = config.network;

  const server = app.listen(externalPort, hostName, () => {
    console.log(`${config.app.name} (${config.env}) listening on ${hostName}:${externalPort}`);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void expressUtils.performGracefulShutdown(signal, mongoClient, server);
    });
  }
}

start().catch((err: unknown) => {
  console.error('Failed to start the API:', err);
  process.exit(1);
});
