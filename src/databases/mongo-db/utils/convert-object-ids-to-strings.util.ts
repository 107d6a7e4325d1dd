import _ from 'lodash';
import { Document, ObjectId, WithId } from 'mongodb';

import { IStoredDocument } from '../../models/database.interface.js';

/**
 * Converts MongoDB ObjectIds anywhere inside a value to their hex string form.
 * Dates are preserved, everything else is returned as is.
 */
export function convertObjectIdsToStrings(value: unknown): unknown {
	if (value instanceof ObjectId) {
		return value.toHexString();
	}

	if (value === null || typeof value !== 'object' || value instanceof Date) {
		return value;
	}

	if (Array.isArray(value)) {
		return value.map(item => convertObjectIdsToStrings(item));
	}

	return _.mapValues(value, item => convertObjectIdsToStrings(item));
}

/**
 * Exposes the driver generated ObjectId _id as its 24 character hex string.
 */
export function toStoredDocument(document: WithId<Document>): IStoredDocument {
	const { _id, ...rest } = document;

	return {
		..._.mapValues(rest, item => convertObjectIdsToStrings(item)),
		_id: _id.toHexString(),
	};
}
