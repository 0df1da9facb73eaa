/**
 * Veilpost - Protocol Enums
 * Defines constants and enumerations for the E2EE wire protocol
 */

/** Stable codes carried by every E2EE error */
export enum E2EEErrorCode {
  SETUP_FAILED = 'SETUP_FAILED',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  DIRECTORY_UNAVAILABLE = 'DIRECTORY_UNAVAILABLE',
  KEY_AGREEMENT_FAILED = 'KEY_AGREEMENT_FAILED',
  INVALID_BUNDLE = 'INVALID_BUNDLE',
  DECRYPTION_FAILED = 'DECRYPTION_FAILED',
  REVOCATION_FAILED = 'REVOCATION_FAILED',
  TRUST_RECORD_CORRUPT = 'TRUST_RECORD_CORRUPT',
}

/** Trust state of a peer identity key, as recorded on this device */
export enum TrustLevel {
  /** Trusted on first use, never compared out of band */
  TOFU = 'TOFU',
  /** Safety number compared and confirmed by the user */
  VERIFIED = 'VERIFIED',
  /** Key changed since it was first seen; needs re-verification */
  CHANGED = 'CHANGED',
}
