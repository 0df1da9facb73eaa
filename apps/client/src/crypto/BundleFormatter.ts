/**
 * Veilpost - Bundle Formatter
 *
 * Pure projections of local key material onto directory payloads.
 * Only public halves and signatures are read; private keys are never touched.
 */

import {
  bytesToBase64,
  preKeyUploadSchema,
  registrationPayloadSchema,
  type PreKeyUpload,
  type PreKeyUploadEntry,
  type RegistrationPayload,
} from '@veilpost/shared';
import { SetupError } from './errors.js';
import type { KeyBundle, OneTimePreKey } from './types.js';

function toUploadEntry(key: OneTimePreKey): PreKeyUploadEntry {
  return { key_id: key.keyId, public_key: bytesToBase64(key.keyPair.publicKey) };
}

export function formatForRegistration(bundle: KeyBundle): RegistrationPayload {
  const payload: RegistrationPayload = {
    identity_key: bytesToBase64(bundle.identity.dh.publicKey),
    identity_signing_key: bytesToBase64(bundle.identity.signing.publicKey),
    key_id: bundle.identity.keyId,
    device_id: bundle.deviceId,
    signed_prekey: {
      public_key: bytesToBase64(bundle.signedPreKey.keyPair.publicKey),
      signature: bytesToBase64(bundle.signedPreKey.signature),
      key_id: bundle.signedPreKey.keyId,
    },
    one_time_prekeys: bundle.oneTimePreKeys.map(toUploadEntry),
  };

  const checked = registrationPayloadSchema.safeParse(payload);
  if (!checked.success) {
    throw new SetupError('Registration payload failed validation', { cause: checked.error });
  }
  return checked.data;
}

export function formatPreKeysForUpload(keys: OneTimePreKey[]): PreKeyUpload {
  return preKeyUploadSchema.parse({ prekeys: keys.map(toUploadEntry) });
}
