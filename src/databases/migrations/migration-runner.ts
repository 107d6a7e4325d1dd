import { Umzug, MongoDBStorage } from 'umzug';
import { Db } from 'mongodb';

import { getMongoInitialSchema } from '../mongo-db/migrations/mongo-initial-schema.js';

export const MIGRATIONS_COLLECTION = 'migrations';

export type MigrationCommand = 'up' | 'down';

export class MigrationRunner {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  private getMigrator() {
    return new Umzug({
      migrations: getMongoInitialSchema(),
      context: this.db,
      storage: new MongoDBStorage({ collection: this.db.collection(MIGRATIONS_COLLECTION) }),
      logger: console,
    });
  }

  /**
   * up applies every pending migration, down reverts the most recent one.
   * @returns the names of the migrations that ran
   */
  public async run(command: MigrationCommand): Promise<string[]> {
    const migrator = this.getMigrator();

    const migrations = command === 'up' ? await migrator.up() : await migrator.down();
    const names = migrations.map(migration => migration.name);

    console.log(`✅ Migrations ${command} complete${names.length ? `: ${names.join(', ')}` : ' (nothing to run)'}`);
    return names;
  }
}
