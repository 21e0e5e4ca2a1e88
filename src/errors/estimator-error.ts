/**
 * Coded errors raised by the estimator and its collaborators.
 *
 * @module errors/estimator-error
 */

export const ERROR_CODES = {
  NUMERIC_PATH_UNSUPPORTED: 'ESTIMATOR_NUMERIC_PATH_UNSUPPORTED',
  EMPTY_AGGREGATION: 'ESTIMATOR_EMPTY_AGGREGATION',
  SCENARIO_INVALID: 'ESTIMATOR_SCENARIO_INVALID',
  SCENARIO_READ_FAILED: 'ESTIMATOR_SCENARIO_READ_FAILED',
  HARDWARE_KEYS_MISSING: 'ESTIMATOR_HARDWARE_KEYS_MISSING',
  LAYER_TYPE_UNSUPPORTED: 'ESTIMATOR_LAYER_TYPE_UNSUPPORTED',
  SETTINGS_INVALID: 'ESTIMATOR_SETTINGS_INVALID',
  CLI_USAGE: 'ESTIMATOR_CLI_USAGE',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class EstimatorError extends Error {
  readonly code: ErrorCode;
  readonly details?: Readonly<Record<string, unknown>>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EstimatorError';
    this.code = code;
    this.details = details;
  }
}

export function createEstimatorError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): EstimatorError {
  return new EstimatorError(code, message, details);
}

export function isEstimatorError(value: unknown): value is EstimatorError {
  return value instanceof EstimatorError;
}
