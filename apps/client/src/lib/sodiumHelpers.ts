/**
 * Veilpost - Libsodium Helpers
 *
 * Single entry point to libsodium-wrappers. Every caller awaits loadSodium()
 * instead of touching `sodium.ready` itself.
 */

import sodium from 'libsodium-wrappers';

/**
 * The properly typed libsodium module.
 */
export type SodiumModule = typeof sodium;

let ready: Promise<SodiumModule> | null = null;

/**
 * Resolves libsodium once its WASM core is ready.
 *
 * @example
 * ```typescript
 * const sodium = await loadSodium();
 * const pair = sodium.crypto_box_keypair();
 * ```
 */
export function loadSodium(): Promise<SodiumModule> {
  if (!ready) {
    ready = sodium.ready.then(() => sodium);
  }
  return ready;
}

/**
 * Overwrite key material in place.
 */
export function wipe(...buffers: Uint8Array[]): void {
  for (const buffer of buffers) {
    buffer.fill(0);
  }
}
