import { CustomError } from './custom.error.js';

/**
 * Raised when a write would duplicate something that must be unique, such as a school's email.
 * Reported as a 400 so existing clients of the signup endpoint keep working.
 */
export class ConflictError extends CustomError {
  statusCode = 400;

  constructor(message: string) {
    super(message);

    Object.setPrototypeOf(this, ConflictError.prototype);
  }

  serializeErrors() {
    return [{ message: this.message }];
  }
}
