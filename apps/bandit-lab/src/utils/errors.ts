/**
 * Bandit Lab Error Classes
 */

/**
 * Base application error
 */
export class BanditLabError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'BanditLabError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Arm index passed to a policy update is outside [0, K)
 */
export class InvalidArmIndexError extends BanditLabError {
  constructor(armIndex: number, numArms: number) {
    super(
      `Arm index ${armIndex} is out of range for ${numArms} arm(s)`,
      'INVALID_ARM_INDEX',
      { armIndex, numArms }
    );
    this.name = 'InvalidArmIndexError';
  }
}

/**
 * Experiment parameters rejected at construction or run time
 */
export class InvalidConfigurationError extends BanditLabError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIGURATION', details);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Environment configuration failed validation
 */
export class ConfigurationError extends BanditLabError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Reward table could not be written
 */
export class ReportPersistenceError extends BanditLabError {
  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to write reward table to ${filePath}`,
      'REPORT_PERSISTENCE_ERROR',
      { filePath, cause: cause instanceof Error ? cause.message : String(cause) }
    );
    this.name = 'ReportPersistenceError';
  }
}

export const isBanditLabError = (error: unknown): error is BanditLabError => {
  return error instanceof BanditLabError;
};

/**
 * Normalize anything thrown into a BanditLabError
 */
export const handleError = (error: unknown): BanditLabError => {
  if (isBanditLabError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new BanditLabError(
      error.message,
      'UNKNOWN_ERROR',
      { originalError: error.name }
    );
  }

  return new BanditLabError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    { originalError: String(error) }
  );
};
