/**
 * Veilpost - Crypto Module Types
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PROTOCOL OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Direct messages are encrypted with a per-message X3DH key agreement:
 *
 * 1. Each device publishes a prekey bundle: identity key, signed prekey and
 *    a pool of one-time prekeys. Only public halves leave the device.
 * 2. A sender fetches the recipient's bundle, verifies the signed prekey,
 *    runs X3DH with a fresh ephemeral key and derives a 32-byte key (HKDF).
 * 3. The message is sealed with AES-256-GCM under that key.
 * 4. The recipient mirrors the agreement from the ephemeral key and the
 *    sender's identity key, then opens the message.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MODULE BOUNDARIES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │                         REST OF THE APP                                 │
 * │                (transport, UI, state management)                        │
 * └─────────────────────────────┬───────────────────────────────────────────┘
 *                               │ ONLY imports E2EECrypto
 *                               ▼
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │                          E2EECrypto                                     │
 * │                     (Public Facade Layer)                               │
 * │          - String-based API (base64 for binary data)                    │
 * │          - User-centric operations                                      │
 * └─────────────────────────────┬───────────────────────────────────────────┘
 *                               │ Delegates to
 *        ┌──────────────────────┼──────────────────────────┐
 *        ▼                      ▼                          ▼
 * ┌──────────────────┐ ┌─────────────────────┐ ┌──────────────────────────┐
 * │  LocalKeyStore   │ │  X3DH / Cipher      │ │ PreKeyBundleCache /      │
 * │ (private keys,   │ │ (key agreement,     │ │ DeviceLifecycleManager   │
 * │  SecureStorage)  │ │  AES-256-GCM)       │ │ (KeyDirectoryClient)     │
 * └──────────────────┘ └─────────────────────┘ └──────────────────────────┘
 *
 * IMPORT RULES:
 * - ONLY lib/sodiumHelpers.ts imports 'libsodium-wrappers'
 * - Everything outside crypto/ imports from the crypto/index.ts barrel
 */

import type { EncryptedMessage, DeviceInfo } from '@veilpost/shared';
import type { IdentityStatus } from './IdentityTrustStore.js';

// ============================================================================
// PUBLIC API - E2EECrypto Interface
// ============================================================================

/**
 * Main crypto facade.
 *
 * This is the ONLY interface the rest of the app should use.
 */
export interface E2EECrypto {
  // ────────────────── Initialization ──────────────────

  /**
   * Load local key material, if any.
   * Starts prekey replenishment when this device is already set up.
   */
  initialize(): Promise<void>;

  /**
   * First-time setup: generate keys, persist them, register the public half.
   * All or nothing; refuses to run twice.
   */
  setup(): Promise<void>;

  /** Check if crypto is ready to use. */
  isInitialized(): boolean;

  // ────────────────── Identity ──────────────────

  /** Get this device's identifier. */
  getDeviceId(): string;

  /** Get the public identity key (base64 encoded). */
  getIdentityPublicKey(): string;

  /** Hex SHA-256 of the identity key, for the "my key" screen. */
  getFingerprint(): string;

  // ────────────────── Direct Messages ──────────────────

  /** Encrypt for a user. Returns the payload to hand to the transport. */
  encryptMessage(recipientId: string, plaintext: string): Promise<EncryptedMessage>;

  /** Decrypt a received message. */
  decryptMessage(
    senderId: string,
    senderIdentityKey: string,
    message: EncryptedMessage
  ): Promise<string>;

  // ────────────────── Verification ──────────────────

  /** Safety number between this user and a peer. */
  getSafetyNumber(userId: string): Promise<string>;

  /** How the peer's current identity key compares with the recorded one. */
  getIdentityStatus(userId: string): Promise<IdentityStatus>;

  /** Mark a peer's current identity as verified out of band. */
  markIdentityVerified(userId: string): Promise<void>;

  // ────────────────── Prekey Management ──────────────────

  /** Remaining one-time prekeys held by the directory. */
  getPrekeyCount(): Promise<number>;

  /** Generate and upload additional one-time prekeys. */
  uploadMorePrekeys(count?: number): Promise<number>;

  // ────────────────── Devices ──────────────────

  listDevices(): Promise<DeviceInfo[]>;

  revokeDevice(deviceId: string): Promise<void>;

  // ────────────────── Cleanup ──────────────────

  /** Revoke this device and erase every local key. */
  reset(): Promise<void>;

  /** Stop background work and drop caches. Local keys stay. */
  logout(): void;

  /** Alias of logout() for scoped owners. */
  dispose(): void;
}

// ============================================================================
// KEY MATERIAL (Client-Side Only)
// ============================================================================

/** Raw key pair. Private halves never leave the device. */
export interface KeyPair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/**
 * Long-term device identity.
 * `dh` takes part in X3DH; `signing` authenticates the signed prekey.
 */
export interface IdentityKeyPair {
  keyId: string;
  dh: KeyPair;
  signing: KeyPair;
  createdAt: number;
}

/** Medium-term prekey, signed by the identity signing key. */
export interface SignedPreKey {
  keyId: string;
  keyPair: KeyPair;
  signature: Uint8Array;
  createdAt: number;
}

/** Single-use prekey. */
export interface OneTimePreKey {
  keyId: string;
  keyPair: KeyPair;
}

/** Everything a device owns, as generated at setup. */
export interface KeyBundle {
  deviceId: string;
  identity: IdentityKeyPair;
  signedPreKey: SignedPreKey;
  oneTimePreKeys: OneTimePreKey[];
}

// ============================================================================
// INJECTABLE CAPABILITIES
// ============================================================================

/** Produces key ids. Defaults to 8 random bytes rendered as hex. */
export type KeyIdFactory = (kind: 'identity' | 'signed' | 'one-time') => string;

/** Milliseconds since the epoch. */
export type Clock = () => number;

// ============================================================================
// STORAGE KEYS
// ============================================================================

export const STORAGE_KEYS = {
  KEY_BUNDLE: 'e2ee_key_bundle',
  PEER_IDENTITY_PREFIX: 'peer_identity:',
} as const;
