/**
 * Error taxonomy for transfer-with
 * @module errors
 */

/**
 * Base error class for every failure the tool reports
 */
export class TransferWithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retriable: boolean = false
  ) {
    super(message);
    this.name = 'TransferWithError';
    Object.setPrototypeOf(this, TransferWithError.prototype);
  }
}

/**
 * Thrown when command-line options or the config file fail validation
 */
export class ConfigError extends TransferWithError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'ERR_CONFIG', false);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Thrown when the signer reference cannot be turned into a signer
 */
export class ResolutionError extends TransferWithError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ERR_SIGNER_RESOLUTION', false);
    this.name = 'ResolutionError';
    this.cause = cause;
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }
}

/**
 * Thrown when a balance or blockhash query fails
 */
export class QueryError extends TransferWithError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ERR_QUERY', true);
    this.name = 'QueryError';
    this.cause = cause;
    Object.setPrototypeOf(this, QueryError.prototype);
  }
}

/**
 * Thrown when a required signature cannot be obtained
 */
export class SigningError extends TransferWithError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ERR_SIGNING', false);
    this.name = 'SigningError';
    this.cause = cause;
    Object.setPrototypeOf(this, SigningError.prototype);
  }
}

/** Why a remote signer did not return a signature */
export type RemoteSignerFailure =
  | 'auth_failed'
  | 'sign_error'
  | 'rejected'
  | 'invalid_response'
  | 'request_mismatch'
  | 'timeout'
  | 'socket'
  | 'closed';

/**
 * Thrown by the remote signer transport
 */
export class RemoteSignerError extends SigningError {
  constructor(
    message: string,
    public readonly reason: RemoteSignerFailure,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'RemoteSignerError';
    Object.setPrototypeOf(this, RemoteSignerError.prototype);
  }
}

/**
 * Thrown when the cluster rejects the transaction or it fails on chain
 */
export class SubmissionError extends TransferWithError {
  constructor(message: string, code: string = 'ERR_SUBMISSION') {
    super(message, code, false);
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

/**
 * Thrown when confirmation does not arrive within the bounded wait
 */
export class SubmissionTimeoutError extends SubmissionError {
  constructor(
    message: string,
    public readonly signature?: string
  ) {
    super(message, 'ERR_SUBMISSION_TIMEOUT');
    this.name = 'SubmissionTimeoutError';
    Object.setPrototypeOf(this, SubmissionTimeoutError.prototype);
  }
}

/**
 * Thrown for balances or amounts outside the u64 lamport range
 */
export class InvalidAmountError extends TransferWithError {
  constructor(message: string) {
    super(message, 'ERR_INVALID_AMOUNT', false);
    this.name = 'InvalidAmountError';
    Object.setPrototypeOf(this, InvalidAmountError.prototype);
  }
}

/**
 * Thrown when instruction data does not hold a System Program transfer
 */
export class InvalidInstructionError extends TransferWithError {
  constructor(message: string) {
    super(message, 'ERR_INVALID_INSTRUCTION', false);
    this.name = 'InvalidInstructionError';
    Object.setPrototypeOf(this, InvalidInstructionError.prototype);
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
