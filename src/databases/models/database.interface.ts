import { IQueryOptions } from '../../models/query-options.interface.js';

/**
 * A document as it comes back from the store: _id already in canonical string form,
 * everything else untyped until a model spec has decoded it.
 */
export interface IStoredDocument {
  _id: string;
  [key: string]: unknown;
}

/**
 * The store capability handed to services. Implementations throw StoreUnavailableError
 * when the store cannot be reached, never an empty result.
 */
export interface IDatabase {
  readonly isConnected: boolean;
  readonly databaseName: string | null;
  create(entity: Record<string, unknown>, collectionName: string): Promise<{ insertedId: string }>;
  find(queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument[]>;
  findOne(queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument | null>;
  /**
   * @returns null when the id is not a well-formed id or no document has it
   */
  getById(id: string, collectionName: string): Promise<IStoredDocument | null>;
  listCollectionNames(): Promise<string[]>;
}
