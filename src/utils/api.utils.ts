import { Request, Response } from 'express';

import { IError, ValidationError } from '../errors/index.js';

export interface IApiResponseOptions<T> {
	errors?: IError[];
	data?: T;
}

export interface IApiErrorResponse {
	success: false;
	status: number;
	errors: IError[];
}

/**
 * Successful responses are the bare data, which is the documented body of every endpoint.
 * Failures use the { success, status, errors } envelope.
 */
function apiResponse<T>(
	response: Response,
	status: number,
	options: IApiResponseOptions<T> = {}
): Response {
	const success = status >= 200 && status < 300;

	if (success) {
		return response.status(status).json(options.data ?? null);
	}

	const errorResponse: IApiErrorResponse = {
		success: false,
		status,
		errors: options.errors ?? [],
	};
	return response.status(status).json(errorResponse);
}

/**
 * @throws ValidationError when the parameter is missing or was sent more than once
 */
function getRequiredQueryParam(request: Request, name: string): string {
	const value = request.query[name];

	if (typeof value !== 'string') {
		const message = value === undefined
			? `${name} query parameter is required`
			: `${name} query parameter must be a single string`;
		throw new ValidationError([{ field: name, message }]);
	}

	return value;
}

export const apiUtils = {
	apiResponse,
	getRequiredQueryParam,
};
