import { CustomError, IError } from './custom.error.js';

export class ValidationError extends CustomError {
  statusCode = 422;
  errors: IError[];

  constructor(errors: IError[], message: string = 'Validation failed') {
    super(message);
    this.errors = errors;

    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  serializeErrors(): IError[] {
    return this.errors;
  }
}
