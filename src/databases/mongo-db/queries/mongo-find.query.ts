import { Db } from "mongodb";
import { IQueryOptions } from "../../../models/query-options.interface.js";
import { IStoredDocument } from "../../models/database.interface.js";
import { buildNoSqlMatch, toStoredDocument } from "../utils/index.js";

// natural _id order is insertion order for driver generated ids
export async function find(db: Db, queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument[]> {
    const collection = db.collection(collectionName);
    const filter = buildNoSqlMatch(queryOptions);

    const entities = await collection.find(filter, { sort: { _id: 1 } }).toArray();

    return entities.map(entity => toStoredDocument(entity));
}
