import { IDatabase, IStoredDocument } from "./models/database.interface.js";
import { IQueryOptions } from "../models/query-options.interface.js";
import { StoreUnavailableError } from "../errors/index.js";

/**
 * Stands in for the store when no connection was established at startup.
 * Every data operation fails, so callers can tell "no data" from "no database".
 */
export class UnavailableDatabase implements IDatabase {
    readonly isConnected = false;
    readonly databaseName = null;

    async create(_entity: Record<string, unknown>, _collectionName: string): Promise<{ insertedId: string }> {
        throw new StoreUnavailableError();
    }

    async find(_queryOptions: IQueryOptions, _collectionName: string): Promise<IStoredDocument[]> {
        throw new StoreUnavailableError();
    }

    async findOne(_queryOptions: IQueryOptions, _collectionName: string): Promise<IStoredDocument | null> {
        throw new StoreUnavailableError();
    }

    async getById(_id: string, _collectionName: string): Promise<IStoredDocument | null> {
        throw new StoreUnavailableError();
    }

    async listCollectionNames(): Promise<string[]> {
        throw new StoreUnavailableError();
    }
}
