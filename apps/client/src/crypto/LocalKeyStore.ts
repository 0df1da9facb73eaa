/**
 * Veilpost - Local Key Store
 *
 * Persists this device's private key material as ONE record: identity pairs,
 * signed prekey, key ids, device id and the private halves of one-time
 * prekeys still outstanding. Every mutation is a single storage `set`.
 *
 * SECURITY:
 * - Nothing here is ever sent to the directory
 * - Confidentiality at rest is the storage backend's job (EncryptedFileStorage)
 * - A record that fails validation is reported, never treated as absent
 */

import { z } from 'zod';
import { base64String, base64ToBytes, bytesToBase64, keyId } from '@veilpost/shared';
import type { SecureStorage } from '../lib/secureStorage.js';
import { NotInitializedError, SetupError } from './errors.js';
import { STORAGE_KEYS, type KeyBundle, type KeyPair, type OneTimePreKey } from './types.js';

const RECORD_VERSION = 1;

const keyPairRecordSchema = z.object({
  publicKey: base64String,
  privateKey: base64String,
});

const keyBundleRecordSchema = z.object({
  version: z.literal(RECORD_VERSION),
  deviceId: z.string().min(1),
  identity: z.object({
    keyId,
    dh: keyPairRecordSchema,
    signing: keyPairRecordSchema,
    createdAt: z.number(),
  }),
  signedPreKey: z.object({
    keyId,
    keyPair: keyPairRecordSchema,
    signature: base64String,
    createdAt: z.number(),
  }),
  oneTimePreKeys: z.array(z.object({ keyId, keyPair: keyPairRecordSchema })),
});

type KeyBundleRecord = z.infer<typeof keyBundleRecordSchema>;
type KeyPairRecord = z.infer<typeof keyPairRecordSchema>;

function encodePair(pair: KeyPair): KeyPairRecord {
  return { publicKey: bytesToBase64(pair.publicKey), privateKey: bytesToBase64(pair.privateKey) };
}

function decodePair(record: KeyPairRecord): KeyPair {
  return { publicKey: base64ToBytes(record.publicKey), privateKey: base64ToBytes(record.privateKey) };
}

function encodeBundle(bundle: KeyBundle): KeyBundleRecord {
  return {
    version: RECORD_VERSION,
    deviceId: bundle.deviceId,
    identity: {
      keyId: bundle.identity.keyId,
      dh: encodePair(bundle.identity.dh),
      signing: encodePair(bundle.identity.signing),
      createdAt: bundle.identity.createdAt,
    },
    signedPreKey: {
      keyId: bundle.signedPreKey.keyId,
      keyPair: encodePair(bundle.signedPreKey.keyPair),
      signature: bytesToBase64(bundle.signedPreKey.signature),
      createdAt: bundle.signedPreKey.createdAt,
    },
    oneTimePreKeys: bundle.oneTimePreKeys.map((key) => ({
      keyId: key.keyId,
      keyPair: encodePair(key.keyPair),
    })),
  };
}

function decodeBundle(record: KeyBundleRecord): KeyBundle {
  return {
    deviceId: record.deviceId,
    identity: {
      keyId: record.identity.keyId,
      dh: decodePair(record.identity.dh),
      signing: decodePair(record.identity.signing),
      createdAt: record.identity.createdAt,
    },
    signedPreKey: {
      keyId: record.signedPreKey.keyId,
      keyPair: decodePair(record.signedPreKey.keyPair),
      signature: base64ToBytes(record.signedPreKey.signature),
      createdAt: record.signedPreKey.createdAt,
    },
    oneTimePreKeys: record.oneTimePreKeys.map((key) => ({
      keyId: key.keyId,
      keyPair: decodePair(key.keyPair),
    })),
  };
}

export interface SaveOptions {
  /** Replace an existing record. Only reset flows should pass this. */
  overwrite?: boolean;
}

export class LocalKeyStore {
  /** Tail of the queue serializing read-modify-write cycles on the record. */
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly storage: SecureStorage) {}

  /**
   * Persist a freshly generated bundle.
   * Refuses to replace an existing record unless `overwrite` is set.
   */
  async save(bundle: KeyBundle, options: SaveOptions = {}): Promise<void> {
    await this.serial(async () => {
      if (!options.overwrite && (await this.storage.get(STORAGE_KEYS.KEY_BUNDLE)) !== null) {
        throw new SetupError('Local keys already exist for this device');
      }
      await this.write(bundle);
    });
  }

  /**
   * Load the record. `null` means this device was never set up.
   */
  async load(): Promise<KeyBundle | null> {
    const raw = await this.storage.get(STORAGE_KEYS.KEY_BUNDLE);
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SetupError('Local key record is corrupt', { cause: error });
    }
    const parsed = keyBundleRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new SetupError('Local key record is corrupt', { cause: parsed.error });
    }
    return decodeBundle(parsed.data);
  }

  /**
   * Append private halves of newly generated one-time prekeys.
   */
  async addOneTimePreKeys(keys: OneTimePreKey[]): Promise<void> {
    if (keys.length === 0) return;
    await this.serial(async () => {
      const bundle = await this.require();
      await this.write({ ...bundle, oneTimePreKeys: [...bundle.oneTimePreKeys, ...keys] });
    });
  }

  /**
   * Return and remove a one-time prekey. `null` when unknown.
   */
  async takeOneTimePreKey(keyId: string): Promise<OneTimePreKey | null> {
    return this.serial(async () => {
      const bundle = await this.require();
      const key = bundle.oneTimePreKeys.find((candidate) => candidate.keyId === keyId);
      if (!key) return null;
      await this.write({
        ...bundle,
        oneTimePreKeys: bundle.oneTimePreKeys.filter((candidate) => candidate.keyId !== keyId),
      });
      return key;
    });
  }

  /**
   * Drop the listed one-time prekeys, e.g. a batch the directory never got.
   * Resolves to the number removed.
   */
  async removeOneTimePreKeys(keyIds: string[]): Promise<number> {
    if (keyIds.length === 0) return 0;
    const doomed = new Set(keyIds);
    return this.serial(async () => {
      const bundle = await this.require();
      const kept = bundle.oneTimePreKeys.filter((key) => !doomed.has(key.keyId));
      const removed = bundle.oneTimePreKeys.length - kept.length;
      if (removed > 0) {
        await this.write({ ...bundle, oneTimePreKeys: kept });
      }
      return removed;
    });
  }

  /**
   * Erase the record in one operation.
   */
  async clear(): Promise<void> {
    await this.serial(() => this.storage.delete(STORAGE_KEYS.KEY_BUNDLE));
  }

  // ==================== PRIVATE METHODS ====================

  /**
   * Run `task` after every task queued before it. The queue itself never
   * rejects; the caller gets the task's own result or error.
   */
  private serial<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async require(): Promise<KeyBundle> {
    const bundle = await this.load();
    if (!bundle) throw new NotInitializedError('No local keys for this device');
    return bundle;
  }

  private async write(bundle: KeyBundle): Promise<void> {
    await this.storage.set(STORAGE_KEYS.KEY_BUNDLE, JSON.stringify(encodeBundle(bundle)));
  }
}

/**
 * Create a key store over the given storage backend.
 */
export function createLocalKeyStore(storage: SecureStorage): LocalKeyStore {
  return new LocalKeyStore(storage);
}
