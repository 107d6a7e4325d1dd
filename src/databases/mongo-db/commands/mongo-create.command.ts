import { Db, Document, MongoServerError } from "mongodb";
import { DuplicateKeyError } from "../../../errors/index.js";

const DUPLICATE_KEY_ERROR_CODE = 11000;

export async function create(db: Db, collectionName: string, entity: Record<string, unknown>): Promise<{ insertedId: string }> {
    try {
        const collection = db.collection(collectionName);
        // copy so the driver does not add an _id to the caller's object
        const document: Document = { ...entity };
        const insertResult = await collection.insertOne(document);

        return {
            insertedId: insertResult.insertedId.toHexString()
        };
    }
    catch (err: unknown) {
        if (err instanceof MongoServerError && err.code === DUPLICATE_KEY_ERROR_CODE) {
            throw new DuplicateKeyError(`${collectionName} already exists`);
        }
        throw err;
    }
}
