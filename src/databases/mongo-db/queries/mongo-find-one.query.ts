import { Db } from "mongodb";
import { IQueryOptions } from "../../../models/query-options.interface.js";
import { IStoredDocument } from "../../models/database.interface.js";
import { buildNoSqlMatch, toStoredDocument } from "../utils/index.js";

export async function findOne(db: Db, queryOptions: IQueryOptions, collectionName: string): Promise<IStoredDocument | null> {
    const collection = db.collection(collectionName);
    const filter = buildNoSqlMatch(queryOptions);

    const entity = await collection.findOne(filter);

    return entity ? toStoredDocument(entity) : null;
}
