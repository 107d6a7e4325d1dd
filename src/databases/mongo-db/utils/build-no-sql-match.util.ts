import { Document, Filter, ObjectId } from 'mongodb';

import { FilterValue, IQueryOptions } from '../../../models/query-options.interface.js';
import { entityUtils } from '../../../utils/entity.utils.js';

// _id is stored as an ObjectId, every other property keeps the type it was written with
function toMongoValue(key: string, value: FilterValue): FilterValue | ObjectId {
	if (key === '_id' && entityUtils.isValidObjectId(value)) {
		return new ObjectId(value);
	}
	return value;
}

export function buildNoSqlMatch(queryOptions: IQueryOptions): Filter<Document> {
	const filters = queryOptions.filters || {};
	const match: Filter<Document> = {};

	for (const [key, filter] of Object.entries(filters)) {
		if (filter.eq !== undefined) {
			match[key] = toMongoValue(key, filter.eq);
		}
		else if (filter.in !== undefined) {
			match[key] = { $in: filter.in.map(value => toMongoValue(key, value)) };
		}
	}

	return match;
}
