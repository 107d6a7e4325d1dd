export interface IError {
	message: string;
	field?: string;
}

/**
 * Base class for every error the API turns into an HTTP response.
 * The error handler uses statusCode and serializeErrors() to build the response body.
 */
export abstract class CustomError extends Error {
	abstract statusCode: number;

	constructor(message: string) {
		super(message);

		Object.setPrototypeOf(this, CustomError.prototype);
	}

	abstract serializeErrors(): IError[];
}
