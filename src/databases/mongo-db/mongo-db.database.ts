import { Db } from "mongodb";
import { IQueryOptions } from "../../models/query-options.interface.js";
import { IDatabase, IStoredDocument } from "../models/database.interface.js";
import { create } from "./commands/index.js";
import { find, findOne, getById } from "./queries/index.js";
import { CustomError, StoreUnavailableError } from "../../errors/index.js";

export class MongoDBDatabase implements IDatabase {
    private db: Db;
    readonly isConnected = true;

    constructor(
        db: Db,
    ) {
        this.db = db;
    }

    get databaseName(): string {
        return this.db.databaseName;
    }

    /**
     * Our own errors (duplicate keys) pass through; anything the driver throws means we could not talk to the store.
     */
    private async execute<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        }
        catch (err: unknown) {
            if (err instanceof CustomError) {
                throw err;
            }
            throw StoreUnavailableError.fromCause(err);
        }
    }

    async create(entity: Record<string, unknown>, collectionName: string): Promise<{ insertedId: string }> {
        return this.execute(() => create(this.db, collectionName, entity));
    }

    async find(queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument[]> {
        return this.execute(() => find(this.db, queryOptions, collectionName));
    }

    async findOne(queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument | null> {
        return this.execute(() => findOne(this.db, queryOptions, collectionName));
    }

    async getById(id: string, collectionName: string): Promise<IStoredDocument | null> {
        return this.execute(() => getById(this.db, id, collectionName));
    }

    async listCollectionNames(): Promise<string[]> {
        return this.execute(async () => {
            const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
            return collections.map(collection => collection.name);
        });
    }
};
