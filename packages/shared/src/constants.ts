/**
 * Veilpost - Constants
 * Shared constants used by the E2EE client and the key directory
 */

/** API configuration */
export const API = {
  /** Default directory port */
  DEFAULT_PORT: 4000,
  /** API base path */
  BASE_PATH: '/api/v1',
} as const;

/** Crypto configuration */
export const CRYPTO = {
  /** One-time prekeys generated at setup */
  INITIAL_PREKEY_COUNT: 100,
  /** Default batch for a manual prekey upload */
  UPLOAD_BATCH_SIZE: 50,
  /** Replenish when the directory holds fewer than this many prekeys */
  PREKEY_LOW_WATER_MARK: 20,
  /** Replenish up to this many prekeys */
  PREKEY_HIGH_WATER_MARK: 100,
  /** Interval between replenishment checks (5 minutes) */
  REPLENISH_INTERVAL_MS: 5 * 60 * 1000,
  /** Lifetime of a cached recipient bundle (5 minutes) */
  BUNDLE_CACHE_TTL_MS: 5 * 60 * 1000,
  /** Random bytes in a key id (rendered as hex) */
  KEY_ID_BYTES: 8,
  /** Raw X25519 / Ed25519 public key length */
  PUBLIC_KEY_BYTES: 32,
  /** Derived message key length */
  SHARED_SECRET_BYTES: 32,
  /** AES-GCM nonce length */
  NONCE_BYTES: 12,
  /** HKDF info string bound into every derived secret */
  HKDF_INFO: 'CGraph E2EE v1',
} as const;

/** Safety number layout */
export const SAFETY_NUMBER = {
  /** Number of 5-digit groups */
  GROUPS: 12,
  /** Digits per group */
  GROUP_DIGITS: 5,
  /** Groups per display line */
  GROUPS_PER_LINE: 6,
} as const;

/** Directory request retry policy */
export const RETRY = {
  /** Total attempts including the first */
  MAX_ATTEMPTS: 3,
  /** Delay before the second attempt */
  BASE_DELAY_MS: 250,
  /** Backoff multiplier between attempts */
  BACKOFF: 2,
} as const;
