import { MongoClient } from 'mongodb';

import { loadBaseApiConfig } from './config/index.js';
import { MigrationCommand, MigrationRunner } from './databases/migrations/migration-runner.js';

function parseCommand(arg: string | undefined): MigrationCommand {
  if (arg === 'up' || arg === 'down') {
    return arg;
  }
  throw new Error(`Unknown migration command "${arg ?? ''}". Use "up" or "down".`);
}

async function migrate(): Promise<void> {
  const command = parseCommand(process.argv[2]);
  const { database } = loadBaseApiConfig();

  if (!database) {
    throw new Error('DATABASE_URL and DATABASE_NAME must be set to run migrations');
  }

  const client = await MongoClient.connect(database.url);
  try {
    await new MigrationRunner(client.db(database.name)).run(command);
  }
  finally {
    await client.close();
  }
}

migrate().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
