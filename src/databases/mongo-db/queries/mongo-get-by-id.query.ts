import { Db, ObjectId } from "mongodb";
import { IStoredDocument } from "../../models/database.interface.js";
import { entityUtils } from "../../../utils/entity.utils.js";
import { toStoredDocument } from "../utils/index.js";

export async function getById(db: Db, id: string, collectionName: string): Promise<IStoredDocument | null> {
    if (!entityUtils.isValidObjectId(id)) {
        return null;
    }

    const collection = db.collection(collectionName);
    const entity = await collection.findOne({ _id: new ObjectId(id) });

    return entity ? toStoredDocument(entity) : null;
}
