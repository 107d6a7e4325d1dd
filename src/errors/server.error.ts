import { CustomError, IError } from './custom.error.js';

export class ServerError extends CustomError {
	statusCode = 500;

	constructor(message: string) {
		super(message);

		Object.setPrototypeOf(this, ServerError.prototype);
	}

	serializeErrors(): IError[] {
		return [{ message: this.message }];
	}

}
