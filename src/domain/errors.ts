/**
 * Request-terminal errors. The Express error handler turns these into
 * `{ ok: false, error }` responses with `statusCode`.
 */
export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

// Duplicate registration is reported as 400, same as other bad input.
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404);
  }
}
