import { Db, MongoClient } from 'mongodb';

import { IBaseApiConfig } from '../models/base-api-config.interface.js';
import { IDatabase } from './models/database.interface.js';
import { MongoDBDatabase } from './mongo-db/mongo-db.database.js';
import { UnavailableDatabase } from './unavailable.database.js';

export interface IDatabaseConnection {
  mongoClient: MongoClient | null;
  db: Db | null;
  database: IDatabase;
}

/**
 * Connects once at startup. There is no reconnect: when this fails the process keeps running
 * against an UnavailableDatabase and store-dependent endpoints report it.
 */
export async function connectDatabase(config: IBaseApiConfig): Promise<IDatabaseConnection> {
  const unavailable: IDatabaseConnection = { mongoClient: null, db: null, database: new UnavailableDatabase() };

  if (!config.database) {
    console.warn('DATABASE_URL or DATABASE_NAME is not set, starting without a database');
    return unavailable;
  }

  try {
    const mongoClient = await MongoClient.connect(config.database.url);
    const db = mongoClient.db(config.database.name);
    console.log(`Connected to MongoDB database ${db.databaseName}`);
    return { mongoClient, db, database: new MongoDBDatabase(db) };
  }
  catch (err: unknown) {
    console.error('Could not connect to MongoDB, starting without a database:', err);
    return unavailable;
  }
}
