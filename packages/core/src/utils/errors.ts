/**
 * Error types for fatal setup failures
 */

export enum SetupErrorCode {
  UNSUPPORTED_OS = 'UNSUPPORTED_OS',
  INSTALL_FAILED = 'INSTALL_FAILED',
  BOOTSTRAP_FAILED = 'BOOTSTRAP_FAILED',
  INSTALL_NOT_VERIFIED = 'INSTALL_NOT_VERIFIED',
  CONFIG_WRITE_FAILED = 'CONFIG_WRITE_FAILED',
  KEYGEN_FAILED = 'KEYGEN_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * A failure that ends the run with exit code 1.
 * `step` is the label printed in front of the message.
 */
export class SetupError extends Error {
  readonly code: SetupErrorCode;
  readonly step: string;
  readonly context?: Record<string, unknown>;

  constructor(code: SetupErrorCode, step: string, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.step = step;
    this.context = context;
  }
}

export const isSetupError = (error: unknown): error is SetupError => error instanceof SetupError;

/**
 * Message of anything thrown
 */
export const errorMessage = (error: unknown): string =>
  typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
    ? error.message
    : String(error);
