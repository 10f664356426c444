import { ValidationError } from '../../src/core/errors';

/**
 * Await `promise` and return the ValidationError it rejects with
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<ValidationError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a validation failure');
}
