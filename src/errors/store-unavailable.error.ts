import { CustomError } from './custom.error.js';

export const STORE_NOT_CONFIGURED_MESSAGE = 'Database not configured';
export const MAX_DISPLAYED_FAULT_LENGTH = 50;

/**
 * The store could not be reached: either no connection was established at startup,
 * or the driver failed while talking to it. Never used to mean "no data".
 */
export class StoreUnavailableError extends CustomError {
  statusCode = 500;

  constructor(message: string = STORE_NOT_CONFIGURED_MESSAGE) {
    super(message);

    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }

  static fromCause(cause: unknown): StoreUnavailableError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new StoreUnavailableError(`Database unavailable: ${detail.slice(0, MAX_DISPLAYED_FAULT_LENGTH)}`);
  }

  serializeErrors() {
    return [{ message: this.message }];
  }
}
