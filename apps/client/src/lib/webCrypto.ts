/**
 * Veilpost - WebCrypto Helpers
 *
 * SHA-256, HKDF and AES-GCM come from `globalThis.crypto.subtle`
 * (Node.js 20 ships it unflagged).
 */

/**
 * Copy into a fresh ArrayBuffer-backed view, the shape SubtleCrypto takes.
 */
export function bufferSource(bytes: Uint8Array) {
  return new Uint8Array(bytes);
}

export function getSubtle(): SubtleCrypto {
  const subtle = globalThis.crypto?.subtle;
  if (!subtle) {
    throw new Error('WebCrypto (crypto.subtle) is not available in this runtime');
  }
  return subtle;
}

export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  return new Uint8Array(await getSubtle().digest('SHA-256', bufferSource(data)));
}

/**
 * HKDF-SHA256 (RFC 5869), `length` bytes of output.
 */
export async function hkdfSha256(
  ikm: Uint8Array,
  salt: Uint8Array,
  info: Uint8Array,
  length: number
): Promise<Uint8Array> {
  const subtle = getSubtle();
  const key = await subtle.importKey('raw', bufferSource(ikm), 'HKDF', false, ['deriveBits']);
  const bits = await subtle.deriveBits(
    { name: 'HKDF', hash: 'SHA-256', salt: bufferSource(salt), info: bufferSource(info) },
    key,
    length * 8
  );
  return new Uint8Array(bits);
}
