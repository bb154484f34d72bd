import { ZodError, ZodIssue } from 'zod';
import { HttpError } from './httpError';
import { PersistenceError } from './persistenceError';

export interface MappedError {
  status: number;
  error: string;
  details?: ZodIssue[];
}

// body-parser attaches status/expose to the errors it raises for unreadable bodies.
function isClientBodyError(err: unknown): err is { status: number; message: string } {
  if (typeof err !== 'object' || err === null) return false;
  const status = 'status' in err ? err.status : undefined;
  const expose = 'expose' in err ? err.expose : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 && expose === true;
}

// Normalizes thrown errors into an HTTP response shape without leaking store internals.
export function mapError(err: unknown): MappedError {
  if (err instanceof ZodError) {
    return { status: 400, error: 'Invalid request body', details: err.issues };
  }
  if (err instanceof PersistenceError) {
    return { status: 500, error: 'Internal persistence error' };
  }
  if (err instanceof HttpError) {
    return { status: err.status, error: err.message };
  }
  if (isClientBodyError(err)) {
    return { status: err.status, error: err.status === 400 ? 'Malformed request body' : err.message };
  }
  return { status: 500, error: 'Internal Server Error' };
}
