import { CustomError } from './custom.error.js';

export class BadRequestError extends CustomError {
  statusCode = 400;

  constructor(message: string = 'Bad Request') {
    super(message);

    Object.setPrototypeOf(this, BadRequestError.prototype);
  }

  serializeErrors() {
    return [{ message: this.message }];
  }
}
