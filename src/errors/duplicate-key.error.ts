import { ConflictError } from './conflict.error.js';

// thrown by the database layer when a unique index rejects an insert
export class DuplicateKeyError extends ConflictError {
  constructor(message: string) {
    super(message);

    Object.setPrototypeOf(this, DuplicateKeyError.prototype);
  }
}
