import { Request, Response, NextFunction } from 'express';

import { BadRequestError, CustomError } from '../errors/index.js';
import { apiUtils } from '../utils/api.utils.js';
import { config } from '../config/base-api-config.js';

/**
 * List of property names considered sensitive, lower case
 */
const SENSITIVE_FIELDS = [
	'password',
	'token',
	'apikey',
	'secret',
	'authorization',
	'cookie',
	'email',
	'phone',
	'address',
	'account_number',
	'ifsc'
];

/**
 * Sanitize data by replacing sensitive information with asterisks
 */
export const sanitizeData = (data: unknown): unknown => {
	if (!data || typeof data !== 'object') {
		return data;
	}

	// Handle arrays
	if (Array.isArray(data)) {
		return data.map(item => sanitizeData(item));
	}

	// Handle objects
	const sanitized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		sanitized[key] = SENSITIVE_FIELDS.includes(key.toLowerCase()) ? '********' : sanitizeData(value);
	}

	return sanitized;
};

// body-parser reports unparseable JSON as an error carrying this type
const isMalformedBodyError = (err: Error): boolean => 'type' in err && err.type === 'entity.parse.failed';

// this is used as an error handler by express because we accept all four parameters in our handler
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
	if (config.debug?.showErrors || config.env !== 'test') {
		console.error('API Error:', {
			error: err.message,
			stack: err.stack,
			path: req.path,
			method: req.method,
			body: sanitizeData(req.body),
			query: sanitizeData(req.query),
			timestamp: new Date().toISOString(),
			errorType: err.constructor.name,
			isCustomError: err instanceof CustomError,
			headers: sanitizeData(req.headers)
		});
	}

	const error = isMalformedBodyError(err) ? new BadRequestError('Malformed JSON body') : err;

	if (error instanceof CustomError) {
		apiUtils.apiResponse(res, error.statusCode, {
			errors: error.serializeErrors()
		});
	}
	else {
		apiUtils.apiResponse(res, 500, {
			errors: [{ message: 'Server Error' }]
		});
	}
};
