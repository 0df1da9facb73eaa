/**
 * Veilpost - Secure Storage
 *
 * Key/value capability the crypto module persists through.
 * Values are opaque strings; callers serialize their own records.
 *
 * Backends:
 * - MemorySecureStorage: process memory, for tests and ephemeral sessions
 * - EncryptedFileStorage: one file per key, sealed with XChaCha20-Poly1305
 *   under a master key (VEILPOST_KEYSTORE_KEY)
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { base64ToBytes, bytesToBase64 } from '@veilpost/shared';
import { config } from './env.js';
import { keyStoreLogger } from './logger.js';
import { loadSodium, type SodiumModule } from './sodiumHelpers.js';

export interface SecureStorage {
  /** Get a value, or null when absent. */
  get(key: string): Promise<string | null>;

  /** Set a value in one write; replaces any previous value. */
  set(key: string, value: string): Promise<void>;

  /** Delete a value. Deleting an absent key is not an error. */
  delete(key: string): Promise<void>;
}

export class MemorySecureStorage implements SecureStorage {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Number of stored entries. */
  get size(): number {
    return this.entries.size;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed storage. Each value is encrypted before it touches disk.
 *
 * File layout: base64(nonce || ciphertext), the storage key bound in as
 * associated data so a file cannot be swapped for another entry.
 */
export class EncryptedFileStorage implements SecureStorage {
  private sodium: SodiumModule | null = null;

  private static readonly MASTER_KEY_FILE = 'master.key';

  constructor(
    private readonly directory: string,
    private readonly masterKey: Uint8Array
  ) {}

  async get(key: string): Promise<string | null> {
    const s = await this.ensureInitialized();
    let sealed: string;
    try {
      sealed = await readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    return s.to_string(this.decrypt(s, key, base64ToBytes(sealed.trim())));
  }

  async set(key: string, value: string): Promise<void> {
    const s = await this.ensureInitialized();
    const sealed = bytesToBase64(this.encrypt(s, key, s.from_string(value)));
    const target = this.pathFor(key);
    const temp = `${target}.tmp`;
    await writeFile(temp, sealed, { mode: 0o600 });
    await rename(temp, target);
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  /**
   * Storage rooted at VEILPOST_KEYSTORE_PATH.
   * Without VEILPOST_KEYSTORE_KEY a master key is generated and kept beside
   * the data, which only protects against casual inspection.
   */
  static async fromConfig(): Promise<EncryptedFileStorage> {
    const directory = config.keystorePath;
    const provisioned = config.keystoreKey;
    if (provisioned) {
      return new EncryptedFileStorage(directory, base64ToBytes(provisioned));
    }

    keyStoreLogger.warn('VEILPOST_KEYSTORE_KEY not set - keeping master key beside the key store');
    const s = await loadSodium();
    await mkdir(directory, { recursive: true, mode: 0o700 });
    const keyPath = join(directory, EncryptedFileStorage.MASTER_KEY_FILE);
    try {
      const stored = await readFile(keyPath, 'utf8');
      return new EncryptedFileStorage(directory, base64ToBytes(stored.trim()));
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
    const masterKey = s.crypto_aead_xchacha20poly1305_ietf_keygen();
    await writeFile(keyPath, bytesToBase64(masterKey), { mode: 0o600 });
    return new EncryptedFileStorage(directory, masterKey);
  }

  // ==================== PRIVATE METHODS ====================

  private async ensureInitialized(): Promise<SodiumModule> {
    if (this.sodium) return this.sodium;
    const s = await loadSodium();
    if (this.masterKey.length !== s.crypto_aead_xchacha20poly1305_ietf_KEYBYTES) {
      throw new Error(
        `Master key must be ${s.crypto_aead_xchacha20poly1305_ietf_KEYBYTES} bytes`
      );
    }
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    this.sodium = s;
    return s;
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.sealed`);
  }

  /**
   * Encrypt data using XChaCha20-Poly1305.
   */
  private encrypt(s: SodiumModule, key: string, plaintext: Uint8Array): Uint8Array {
    const nonce = s.randombytes_buf(s.crypto_aead_xchacha20poly1305_ietf_NPUBBYTES);
    const ciphertext = s.crypto_aead_xchacha20poly1305_ietf_encrypt(
      plaintext,
      key,
      null, // secret nonce (not used)
      nonce,
      this.masterKey
    );

    // Prepend nonce to ciphertext
    const result = new Uint8Array(nonce.length + ciphertext.length);
    result.set(nonce, 0);
    result.set(ciphertext, nonce.length);
    return result;
  }

  /**
   * Decrypt data using XChaCha20-Poly1305.
   */
  private decrypt(s: SodiumModule, key: string, encryptedData: Uint8Array): Uint8Array {
    const nonceLength = s.crypto_aead_xchacha20poly1305_ietf_NPUBBYTES;
    const nonce = encryptedData.slice(0, nonceLength);
    const ciphertext = encryptedData.slice(nonceLength);

    return s.crypto_aead_xchacha20poly1305_ietf_decrypt(
      null, // secret nonce (not used)
      ciphertext,
      key,
      nonce,
      this.masterKey
    );
  }
}
