/**
 * Veilpost - Key Bundle Generator
 *
 * Creates the key material a device publishes: identity (X25519 + Ed25519),
 * a signed prekey and a batch of one-time prekeys.
 *
 * Every call draws fresh randomness from libsodium. A failing RNG is fatal:
 * it surfaces as SetupError and is never retried here.
 */

import { hostname } from 'node:os';
import { CRYPTO, bytesToHex } from '@veilpost/shared';
import { loadSodium, type SodiumModule } from '../lib/sodiumHelpers.js';
import { SetupError } from './errors.js';
import type {
  IdentityKeyPair,
  KeyBundle,
  KeyIdFactory,
  KeyPair,
  OneTimePreKey,
  SignedPreKey,
} from './types.js';

export interface KeyBundleGeneratorOptions {
  keyIds?: KeyIdFactory;
  clock?: () => number;
}

export class KeyBundleGenerator {
  private readonly clock: () => number;
  private readonly keyIds: KeyIdFactory | null;

  constructor(options: KeyBundleGeneratorOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.keyIds = options.keyIds ?? null;
  }

  async generateIdentityKeyPair(): Promise<IdentityKeyPair> {
    const s = await this.sodium();
    return this.guard(() => {
      const dh = s.crypto_box_keypair();
      const signing = s.crypto_sign_keypair();
      return {
        keyId: this.nextKeyId(s, 'identity'),
        dh: { publicKey: dh.publicKey, privateKey: dh.privateKey },
        signing: { publicKey: signing.publicKey, privateKey: signing.privateKey },
        createdAt: this.clock(),
      };
    });
  }

  /**
   * Fresh X25519 prekey with a detached Ed25519 signature over its raw
   * public key, made with the identity signing key.
   */
  async generateSignedPreKey(identity: IdentityKeyPair): Promise<SignedPreKey> {
    const s = await this.sodium();
    return this.guard(() => {
      const keyPair = this.keyPair(s);
      return {
        keyId: this.nextKeyId(s, 'signed'),
        keyPair,
        signature: s.crypto_sign_detached(keyPair.publicKey, identity.signing.privateKey),
        createdAt: this.clock(),
      };
    });
  }

  async generateOneTimePreKeys(count: number): Promise<OneTimePreKey[]> {
    if (!Number.isInteger(count) || count < 0) {
      throw new SetupError(`Prekey count must be a non-negative integer, got ${count}`);
    }
    const s = await this.sodium();
    return this.guard(() => {
      const keys: OneTimePreKey[] = [];
      for (let i = 0; i < count; i++) {
        keys.push({ keyId: this.nextKeyId(s, 'one-time'), keyPair: this.keyPair(s) });
      }
      return keys;
    });
  }

  /**
   * Identity, then signed prekey, then `count` one-time prekeys.
   */
  async generateKeyBundle(
    deviceId: string,
    count: number = CRYPTO.INITIAL_PREKEY_COUNT
  ): Promise<KeyBundle> {
    const identity = await this.generateIdentityKeyPair();
    const signedPreKey = await this.generateSignedPreKey(identity);
    const oneTimePreKeys = await this.generateOneTimePreKeys(count);
    return { deviceId, identity, signedPreKey, oneTimePreKeys };
  }

  /**
   * `node_<host prefix>_<8 hex>_<epoch ms>`
   */
  async generateDeviceId(): Promise<string> {
    const s = await this.sodium();
    const host = hostname().replace(/[^a-zA-Z0-9]/g, '').slice(0, 8) || 'host';
    const random = this.guard(() => bytesToHex(s.randombytes_buf(4)));
    return `node_${host}_${random}_${this.clock()}`;
  }

  // ==================== PRIVATE METHODS ====================

  private async sodium(): Promise<SodiumModule> {
    try {
      return await loadSodium();
    } catch (error) {
      throw new SetupError('libsodium failed to initialize', { cause: error });
    }
  }

  private keyPair(s: SodiumModule): KeyPair {
    const pair = s.crypto_box_keypair();
    return { publicKey: pair.publicKey, privateKey: pair.privateKey };
  }

  private nextKeyId(s: SodiumModule, kind: Parameters<KeyIdFactory>[0]): string {
    if (this.keyIds) return this.keyIds(kind);
    return bytesToHex(s.randombytes_buf(CRYPTO.KEY_ID_BYTES));
  }

  private guard<T>(generate: () => T): T {
    try {
      return generate();
    } catch (error) {
      if (error instanceof SetupError) throw error;
      throw new SetupError('Key generation failed', { cause: error });
    }
  }
}

/**
 * Sequential ids: `<prefix>-1`, `<prefix>-2`, ... per key kind.
 */
export function createSequentialKeyIds(
  prefixes: Record<Parameters<KeyIdFactory>[0], string> = {
    identity: 'ik',
    signed: 'spk',
    'one-time': 'otp',
  }
): KeyIdFactory {
  const counters = new Map<string, number>();
  return (kind) => {
    const next = (counters.get(kind) ?? 0) + 1;
    counters.set(kind, next);
    return `${prefixes[kind]}-${next}`;
  };
}
