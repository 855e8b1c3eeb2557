/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    // Keep subclasses (ConfigurationError, ...) working with instanceof
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static payloadTooLarge(message = 'Payload too large'): AppError {
    return new AppError(message, 413);
  }

  static unprocessable(message: string): AppError {
    return new AppError(message, 422);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }
}

export default AppError;
