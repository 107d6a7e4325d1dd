import { CustomError } from './custom.error.js';

export class AuthError extends CustomError {
  statusCode = 401;

  constructor(message: string = 'Invalid credentials') {
    super(message);
    
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  serializeErrors() {
    return [{ message: this.message }];
  }
}
