/**
 * Veilpost - Crypto Types
 *
 * Wire types for the key directory and encrypted messages.
 *
 * KEY SECURITY MODEL:
 * - Private keys exist ONLY on the device that generated them
 * - The directory stores and serves ONLY public keys
 * - The directory cannot derive any message key
 */

import type { z } from 'zod';
import type {
  serverPrekeyBundleSchema,
  registerKeysResultSchema,
  uploadPreKeysResultSchema,
  preKeyCountSchema,
  deviceInfoSchema,
  preKeyUploadEntrySchema,
  preKeyUploadSchema,
  registrationPayloadSchema,
  encryptedMessageSchema,
} from '../schemas.js';

// ============================================================================
// SERVER-SIDE KEY BUNDLE (Public Keys Only)
// ============================================================================

/**
 * Public key bundle served by the directory.
 * `one_time_prekey` is absent when the recipient's pool is exhausted.
 */
export type ServerPrekeyBundle = z.infer<typeof serverPrekeyBundleSchema>;

/** Payload for registering device keys. Only PUBLIC keys are uploaded. */
export type RegistrationPayload = z.infer<typeof registrationPayloadSchema>;

export type PreKeyUploadEntry = z.infer<typeof preKeyUploadEntrySchema>;
export type PreKeyUpload = z.infer<typeof preKeyUploadSchema>;

export type RegisterKeysResult = z.infer<typeof registerKeysResultSchema>;
export type UploadPreKeysResult = z.infer<typeof uploadPreKeysResultSchema>;
export type PreKeyCount = z.infer<typeof preKeyCountSchema>;
export type DeviceInfo = z.infer<typeof deviceInfoSchema>;

// ============================================================================
// MESSAGE ENCRYPTION
// ============================================================================

/**
 * Encrypted direct message.
 * All binary fields are base64; ids are plain strings.
 */
export type EncryptedMessage = z.infer<typeof encryptedMessageSchema>;
