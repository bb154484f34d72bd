// Lightweight error type that carries an HTTP status code for centralized handling.
export class HttpError extends Error {
  status: number;

  // Accepts a status and message so callers can throw domain-specific HTTP errors.
  constructor(status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

// Malformed identifier, empty item list, or a body that fails validation.
export class InvalidInputError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

// Missing, unknown, or expired session token; also rejected credentials.
export class UnauthenticatedError extends HttpError {
  constructor(message = 'Authentication required') {
    super(401, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}
