import { IDatabase } from '../databases/models/database.interface.js';
import { IBaseApiConfig } from '../models/base-api-config.interface.js';
import { MAX_DISPLAYED_FAULT_LENGTH } from '../errors/index.js';

export const LIVENESS_MESSAGE = 'School Portal Backend Running';
export const MAX_LISTED_COLLECTIONS = 10;

export interface IStoreDiagnostics {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

export class HealthService {
  private database: IDatabase;
  private config: IBaseApiConfig;

  constructor(database: IDatabase, config: IBaseApiConfig) {
    this.database = database;
    this.config = config;
  }

  /**
   * Reports on the store connection. Never throws: a failure to list collections is part of the report.
   */
  async getDiagnostics(): Promise<IStoreDiagnostics> {
    const diagnostics: IStoreDiagnostics = {
      backend: 'Running',
      database: 'Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    };

    if (!this.database.isConnected) {
      return diagnostics;
    }

    diagnostics.database = 'Connected & Working';
    diagnostics.database_url = this.config.database?.url ? 'Set' : 'Not Set';
    diagnostics.database_name = this.database.databaseName;
    diagnostics.connection_status = 'Connected';

    try {
      const collections = await this.database.listCollectionNames();
      diagnostics.collections = collections.slice(0, MAX_LISTED_COLLECTIONS);
    }
    catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      diagnostics.database = `Connected but Error: ${message.slice(0, MAX_DISPLAYED_FAULT_LENGTH)}`;
    }

    return diagnostics;
  }
}
