import { Db } from 'mongodb';

import { SCHOOL_COLLECTION } from '../../../models/school.model.js';
import { ORDER_COLLECTION } from '../../../models/order.model.js';
import { PAYOUT_REQUEST_COLLECTION } from '../../../models/payout-request.model.js';

export interface SyntheticMigration {
  name: string;
  up: (context: { context: Db }) => Promise<void>;
  down: (context: { context: Db }) => Promise<void>;
}

/**
 * Indexes only. Collections are created implicitly by the first createIndex, which also
 * lets these run against a database that already holds data.
 */
export const getMongoInitialSchema = (): SyntheticMigration[] => {
  const migrations: SyntheticMigration[] = [];

  // 1. SCHOOLS
  migrations.push({
    name: '00000000000001_schema-schools',
    up: async ({ context: db }) => {
      await db.collection(SCHOOL_COLLECTION).createIndex({ email: 1 }, { unique: true, name: 'email_unique' });
    },
    down: async ({ context: db }) => {
      await db.collection(SCHOOL_COLLECTION).dropIndex('email_unique');
    }
  });

  // 2. ORDERS
  migrations.push({
    name: '00000000000002_schema-orders',
    up: async ({ context: db }) => {
      await db.collection(ORDER_COLLECTION).createIndex({ school_id: 1, status: 1 }, { name: 'school_id_status' });
    },
    down: async ({ context: db }) => {
      await db.collection(ORDER_COLLECTION).dropIndex('school_id_status');
    }
  });

  // 3. PAYOUT REQUESTS
  migrations.push({
    name: '00000000000003_schema-payout-requests',
    up: async ({ context: db }) => {
      await db.collection(PAYOUT_REQUEST_COLLECTION).createIndex({ school_id: 1, status: 1 }, { name: 'school_id_status' });
    },
    down: async ({ context: db }) => {
      await db.collection(PAYOUT_REQUEST_COLLECTION).dropIndex('school_id_status');
    }
  });

  return migrations;
};
