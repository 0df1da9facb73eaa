/**
 * Veilpost - Wire Schemas
 *
 * Zod schemas for every payload exchanged with the key directory.
 * Anything that crosses the wire is parsed through one of these before use.
 */

import { z } from 'zod';
import { isBase64 } from './utils.js';

/** Non-empty canonical base64 string */
export const base64String = z.string().refine(isBase64, { message: 'Expected base64' });

/** Caller-chosen key id */
export const keyId = z.string().min(1);

// ============================================================================
// DIRECTORY RESPONSES
// ============================================================================

/**
 * Public projection of a device's keys, as served by the directory.
 * Carries no private material.
 */
export const serverPrekeyBundleSchema = z.object({
  identity_key: base64String,
  identity_key_id: keyId,
  identity_signing_key: base64String,
  device_id: z.string().min(1).optional(),
  signed_prekey: base64String,
  signed_prekey_id: keyId,
  signed_prekey_signature: base64String,
  one_time_prekey: base64String.optional(),
  one_time_prekey_id: keyId.optional(),
});

export const registerKeysResultSchema = z.object({
  identity_key_id: keyId,
  signed_prekey_id: keyId,
  one_time_prekey_count: z.number().int().nonnegative(),
});

export const uploadPreKeysResultSchema = z.object({
  uploaded: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export const preKeyCountSchema = z.object({
  count: z.number().int().nonnegative(),
  should_upload: z.boolean(),
});

export const deviceInfoSchema = z.object({
  device_id: z.string().min(1),
  created_at: z.string(),
});

export const deviceListSchema = z.array(deviceInfoSchema);

/**
 * Directory responses are wrapped as `{ data: ... }`.
 */
export function dataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

// ============================================================================
// DIRECTORY REQUESTS
// ============================================================================

export const preKeyUploadEntrySchema = z.object({
  key_id: keyId,
  public_key: base64String,
});

export const preKeyUploadSchema = z.object({
  prekeys: z.array(preKeyUploadEntrySchema),
});

/** Public half of a freshly generated bundle */
export const registrationPayloadSchema = z
  .object({
    identity_key: base64String,
    identity_signing_key: base64String,
    key_id: keyId,
    device_id: z.string().min(1),
    signed_prekey: z.object({
      public_key: base64String,
      signature: base64String,
      key_id: keyId,
    }),
    one_time_prekeys: z.array(preKeyUploadEntrySchema),
  })
  .strict();

// ============================================================================
// MESSAGES
// ============================================================================

/** Encrypted direct message as handed to the transport */
export const encryptedMessageSchema = z.object({
  ciphertext: base64String,
  ephemeralPublicKey: base64String,
  recipientIdentityKeyId: keyId,
  oneTimePreKeyId: keyId.optional(),
  nonce: base64String,
});
