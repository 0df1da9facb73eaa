/**
 * Veilpost - X3DH Agreement Engine
 *
 * Initiator (A) against a published bundle (B):
 *   DH1 = DH(IK_A, SPK_B)
 *   DH2 = DH(EK_A, IK_B)
 *   DH3 = DH(EK_A, SPK_B)
 *   DH4 = DH(EK_A, OPK_B)          only when B's bundle carried one
 *   SK  = HKDF-SHA256(salt = 0^32, info = "CGraph E2EE v1", DH1 || DH2 || DH3 [|| DH4])
 *
 * The responder computes the same four values from its private halves.
 * Every failure is a KeyAgreementError; none is retried.
 */

import {
  CRYPTO,
  base64ToBytes,
  concatBytes,
  type ServerPrekeyBundle,
} from '@veilpost/shared';
import { loadSodium, wipe, type SodiumModule } from '../lib/sodiumHelpers.js';
import { hkdfSha256 } from '../lib/webCrypto.js';
import { KeyAgreementError } from './errors.js';
import type { IdentityKeyPair, OneTimePreKey, SignedPreKey } from './types.js';

const HKDF_SALT = new Uint8Array(CRYPTO.SHARED_SECRET_BYTES);
const HKDF_INFO = new TextEncoder().encode(CRYPTO.HKDF_INFO);

export interface InitiatorAgreement {
  sharedSecret: Uint8Array;
  ephemeralPublicKey: Uint8Array;
  /** Recipient identity key id the secret is bound to */
  recipientIdentityKeyId: string;
  /** Set when DH4 was included */
  oneTimePreKeyId?: string;
}

export interface ResponderInput {
  identity: IdentityKeyPair;
  signedPreKey: SignedPreKey;
  oneTimePreKey: OneTimePreKey | null;
  senderIdentityKey: Uint8Array;
  ephemeralPublicKey: Uint8Array;
}

/**
 * Decode a base64 X25519/Ed25519 public key and check its length.
 */
export function decodePublicKey(encoded: string | undefined, label: string): Uint8Array {
  if (!encoded) {
    throw new KeyAgreementError(`Missing ${label}`);
  }
  let bytes: Uint8Array;
  try {
    bytes = base64ToBytes(encoded);
  } catch (error) {
    throw new KeyAgreementError(`Malformed ${label}`, { cause: error });
  }
  if (bytes.length !== CRYPTO.PUBLIC_KEY_BYTES) {
    throw new KeyAgreementError(
      `${label} must be ${CRYPTO.PUBLIC_KEY_BYTES} bytes, got ${bytes.length}`
    );
  }
  return bytes;
}

function dh(s: SodiumModule, privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  let shared: Uint8Array;
  try {
    shared = s.crypto_scalarmult(privateKey, publicKey);
  } catch (error) {
    throw new KeyAgreementError('Diffie-Hellman rejected the remote public key', { cause: error });
  }
  if (shared.every((byte) => byte === 0)) {
    throw new KeyAgreementError('Diffie-Hellman produced a low-order result');
  }
  return shared;
}

/**
 * Check the signed prekey signature with the bundle's identity signing key.
 */
export async function verifySignedPreKey(bundle: ServerPrekeyBundle): Promise<boolean> {
  const s = await loadSodium();
  const signingKey = decodePublicKey(bundle.identity_signing_key, 'identity signing key');
  const signedPreKey = decodePublicKey(bundle.signed_prekey, 'signed prekey');
  try {
    return s.crypto_sign_verify_detached(
      base64ToBytes(bundle.signed_prekey_signature),
      signedPreKey,
      signingKey
    );
  } catch {
    return false;
  }
}

/**
 * HKDF-SHA256 over the concatenated DH outputs.
 */
export async function deriveSharedSecret(dhOutputs: Uint8Array[]): Promise<Uint8Array> {
  const ikm = concatBytes(...dhOutputs);
  try {
    return await hkdfSha256(ikm, HKDF_SALT, HKDF_INFO, CRYPTO.SHARED_SECRET_BYTES);
  } catch (error) {
    throw new KeyAgreementError('Key derivation failed', { cause: error });
  } finally {
    wipe(ikm, ...dhOutputs);
  }
}

/**
 * Run X3DH as the initiator against a recipient's bundle.
 */
export async function initiateKeyAgreement(
  identity: IdentityKeyPair,
  bundle: ServerPrekeyBundle
): Promise<InitiatorAgreement> {
  const s = await loadSodium();

  const identityKey = decodePublicKey(bundle.identity_key, 'identity key');
  const signedPreKey = decodePublicKey(bundle.signed_prekey, 'signed prekey');
  const oneTimePreKey =
    bundle.one_time_prekey !== undefined
      ? decodePublicKey(bundle.one_time_prekey, 'one-time prekey')
      : null;
  if (oneTimePreKey && !bundle.one_time_prekey_id) {
    throw new KeyAgreementError('One-time prekey has no id');
  }

  if (!(await verifySignedPreKey(bundle))) {
    throw new KeyAgreementError('Signed prekey signature does not verify');
  }

  const ephemeral = s.crypto_box_keypair();
  try {
    const outputs = [
      dh(s, identity.dh.privateKey, signedPreKey),
      dh(s, ephemeral.privateKey, identityKey),
      dh(s, ephemeral.privateKey, signedPreKey),
    ];
    if (oneTimePreKey) {
      outputs.push(dh(s, ephemeral.privateKey, oneTimePreKey));
    }

    return {
      sharedSecret: await deriveSharedSecret(outputs),
      ephemeralPublicKey: ephemeral.publicKey,
      recipientIdentityKeyId: bundle.identity_key_id,
      oneTimePreKeyId: oneTimePreKey ? bundle.one_time_prekey_id : undefined,
    };
  } finally {
    wipe(ephemeral.privateKey);
  }
}

/**
 * Mirror the agreement as the recipient.
 */
export async function respondToKeyAgreement(input: ResponderInput): Promise<Uint8Array> {
  const s = await loadSodium();
  const { identity, signedPreKey, oneTimePreKey, senderIdentityKey, ephemeralPublicKey } = input;

  if (senderIdentityKey.length !== CRYPTO.PUBLIC_KEY_BYTES) {
    throw new KeyAgreementError('Sender identity key has the wrong length');
  }
  if (ephemeralPublicKey.length !== CRYPTO.PUBLIC_KEY_BYTES) {
    throw new KeyAgreementError('Ephemeral key has the wrong length');
  }

  const outputs = [
    dh(s, signedPreKey.keyPair.privateKey, senderIdentityKey),
    dh(s, identity.dh.privateKey, ephemeralPublicKey),
    dh(s, signedPreKey.keyPair.privateKey, ephemeralPublicKey),
  ];
  if (oneTimePreKey) {
    outputs.push(dh(s, oneTimePreKey.keyPair.privateKey, ephemeralPublicKey));
  }
  return deriveSharedSecret(outputs);
}
