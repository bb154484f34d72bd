import { MongoServerError } from 'mongodb';
import { DuplicateRecordError, PersistenceError } from '../../errors/persistenceError';

const DUPLICATE_KEY = 11000;

// Wraps a driver call so every failure leaves the repository as a PersistenceError.
export async function runStoreOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) {
      throw new DuplicateRecordError(operation, err);
    }
    throw new PersistenceError(operation, err);
  }
}
