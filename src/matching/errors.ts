import { AppError } from '../utils/AppError';

/**
 * Raised when matcher weights or topN are invalid.
 *
 * Deterministic: retrying with the same configuration fails the same way.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export default ConfigurationError;
