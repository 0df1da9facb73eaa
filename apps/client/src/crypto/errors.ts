/**
 * Veilpost - E2EE Errors
 *
 * Every failure surfaced by the crypto module is an E2EEError with a stable
 * code. None of them ever carries key material or plaintext.
 */

import { E2EEErrorCode } from '@veilpost/shared';

export class E2EEError extends Error {
  readonly code: E2EEErrorCode;

  constructor(code: E2EEErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'E2EEError';
    this.code = code;
  }
}

/** Key generation, persistence or registration failed during setup. */
export class SetupError extends E2EEError {
  constructor(message: string, options?: ErrorOptions) {
    super(E2EEErrorCode.SETUP_FAILED, message, options);
    this.name = 'SetupError';
  }
}

/** An operation needed local keys before setup()/initialize(). */
export class NotInitializedError extends E2EEError {
  constructor(message = 'E2EE is not initialized') {
    super(E2EEErrorCode.NOT_INITIALIZED, message);
    this.name = 'NotInitializedError';
  }
}

/** The key directory could not be reached or answered with an error. */
export class DirectoryError extends E2EEError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(E2EEErrorCode.DIRECTORY_UNAVAILABLE, message, options);
    this.name = 'DirectoryError';
    this.status = options?.status;
  }

  /** Network failures, 5xx and 429 are worth another attempt. */
  get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 429;
  }
}

export class KeyAgreementError extends E2EEError {
  constructor(
    message: string,
    options?: ErrorOptions,
    code: E2EEErrorCode = E2EEErrorCode.KEY_AGREEMENT_FAILED
  ) {
    super(code, message, options);
    this.name = 'KeyAgreementError';
  }
}

/** The directory served a bundle that does not parse. */
export class InvalidBundleError extends KeyAgreementError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, E2EEErrorCode.INVALID_BUNDLE);
    this.name = 'InvalidBundleError';
  }
}

/** Authentication failed or the input was malformed. Never retried. */
export class DecryptionFailure extends E2EEError {
  constructor(message = 'Message could not be decrypted', options?: ErrorOptions) {
    super(E2EEErrorCode.DECRYPTION_FAILED, message, options);
    this.name = 'DecryptionFailure';
  }
}

export class RevocationError extends E2EEError {
  constructor(message: string, options?: ErrorOptions) {
    super(E2EEErrorCode.REVOCATION_FAILED, message, options);
    this.name = 'RevocationError';
  }
}

/** A stored peer identity record does not parse. */
export class TrustRecordError extends E2EEError {
  constructor(message: string, options?: ErrorOptions) {
    super(E2EEErrorCode.TRUST_RECORD_CORRUPT, message, options);
    this.name = 'TrustRecordError';
  }
}

/**
 * Whether an operation that failed with `error` may be retried by the caller.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof DirectoryError) return error.retryable;
  return error instanceof RevocationError;
}

/** Message of an unknown thrown value, for logging. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
