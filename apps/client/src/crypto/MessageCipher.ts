/**
 * Veilpost - Message Cipher
 *
 * AES-256-GCM with a fresh 12-byte nonce per message. The 16-byte tag is
 * appended to the ciphertext. Any failure to open is a DecryptionFailure;
 * no partial plaintext is ever returned.
 */

import { CRYPTO } from '@veilpost/shared';
import { loadSodium } from '../lib/sodiumHelpers.js';
import { bufferSource, getSubtle } from '../lib/webCrypto.js';
import { DecryptionFailure } from './errors.js';

export interface SealedMessage {
  /** ciphertext || tag */
  ciphertext: Uint8Array;
  nonce: Uint8Array;
}

async function importKey(key: Uint8Array, usage: 'encrypt' | 'decrypt'): Promise<CryptoKey> {
  return getSubtle().importKey('raw', bufferSource(key), { name: 'AES-GCM' }, false, [usage]);
}

export async function encrypt(plaintext: Uint8Array, key: Uint8Array): Promise<SealedMessage> {
  if (key.length !== CRYPTO.SHARED_SECRET_BYTES) {
    throw new RangeError(`Message key must be ${CRYPTO.SHARED_SECRET_BYTES} bytes`);
  }
  const s = await loadSodium();
  const nonce = s.randombytes_buf(CRYPTO.NONCE_BYTES);
  const cryptoKey = await importKey(key, 'encrypt');
  const sealed = await getSubtle().encrypt(
    { name: 'AES-GCM', iv: bufferSource(nonce) },
    cryptoKey,
    bufferSource(plaintext)
  );
  return { ciphertext: new Uint8Array(sealed), nonce };
}

export async function decrypt(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  key: Uint8Array
): Promise<Uint8Array> {
  if (key.length !== CRYPTO.SHARED_SECRET_BYTES) {
    throw new DecryptionFailure('Message key has the wrong length');
  }
  if (nonce.length !== CRYPTO.NONCE_BYTES) {
    throw new DecryptionFailure('Nonce has the wrong length');
  }

  try {
    const cryptoKey = await importKey(key, 'decrypt');
    const opened = await getSubtle().decrypt(
      { name: 'AES-GCM', iv: bufferSource(nonce) },
      cryptoKey,
      bufferSource(ciphertext)
    );
    return new Uint8Array(opened);
  } catch (error) {
    throw new DecryptionFailure('Message authentication failed', { cause: error });
  }
}

export async function encryptText(plaintext: string, key: Uint8Array): Promise<SealedMessage> {
  return encrypt(new TextEncoder().encode(plaintext), key);
}

export async function decryptText(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  key: Uint8Array
): Promise<string> {
  const bytes = await decrypt(ciphertext, nonce, key);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new DecryptionFailure('Plaintext is not valid UTF-8', { cause: error });
  }
}
