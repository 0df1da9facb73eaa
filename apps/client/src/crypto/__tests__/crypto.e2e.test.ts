/**
 * Veilpost - Crypto Module E2E Test
 *
 * Two clients (Alice and Bob) set up against one in-process key directory
 * and exchange encrypted direct messages.
 *
 * WHAT THIS TEST VERIFIES:
 * 1. Both clients can generate and register their key bundles
 * 2. Alice can encrypt a DM that Bob decrypts, and Bob can answer
 * 3. One-time prekeys are consumed once, then DH4 is omitted
 * 4. Failed and concurrent setup leave no half-written state
 * 5. A bundle that fails verification leaves no trust record behind
 * 6. Revoking the active device wipes its keys
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  E2EEErrorCode,
  TrustLevel,
  base64ToBytes,
  bytesToBase64,
  type ServerPrekeyBundle,
} from '@veilpost/shared';
import type { KeyDirectoryClient } from '../../lib/api.js';
import { MemorySecureStorage } from '../../lib/secureStorage.js';
import { InMemoryKeyDirectory } from '../../test/InMemoryKeyDirectory.js';
import {
  createE2EECrypto,
  type E2EECryptoImpl,
  type E2EECryptoOptions,
} from '../E2EECrypto.js';
import {
  DecryptionFailure,
  KeyAgreementError,
  NotInitializedError,
  RevocationError,
  SetupError,
  TrustRecordError,
} from '../errors.js';
import { formatForRegistration } from '../BundleFormatter.js';
import { KeyBundleGenerator, createSequentialKeyIds } from '../KeyBundleGenerator.js';
import { STORAGE_KEYS } from '../types.js';

// ============================================================================
// HELPERS
// ============================================================================

interface Client {
  crypto: E2EECryptoImpl;
  storage: MemorySecureStorage;
}

function createClient(
  directory: InMemoryKeyDirectory,
  userId: string,
  storage = new MemorySecureStorage(),
  overrides: Partial<E2EECryptoOptions> = {}
): Client {
  const crypto = createE2EECrypto({
    userId,
    storage,
    directory: directory.clientFor(userId),
    keyIds: createSequentialKeyIds(),
    deviceId: `${userId}-device`,
    initialPrekeyCount: 5,
    autoReplenish: false,
    ...overrides,
  });
  return { crypto, storage };
}

/** Directory client whose served bundles pass through `tamper` first. */
function tamperingClient(
  directory: InMemoryKeyDirectory,
  userId: string,
  tamper: (bundle: ServerPrekeyBundle) => ServerPrekeyBundle
): KeyDirectoryClient {
  const honest = directory.clientFor(userId);
  return {
    ...honest,
    getPreKeyBundle: async (recipientId, options) =>
      tamper(await honest.getPreKeyBundle(recipientId, options)),
  };
}

// ============================================================================
// TESTS
// ============================================================================

describe('E2EE Crypto Module', () => {
  let directory: InMemoryKeyDirectory;
  let alice: Client;
  let bob: Client;

  beforeEach(() => {
    directory = new InMemoryKeyDirectory();
    alice = createClient(directory, 'alice');
    bob = createClient(directory, 'bob');
  });

  afterEach(() => {
    alice.crypto.dispose();
    bob.crypto.dispose();
  });

  describe('Setup', () => {
    it('should register identity, signed prekey and one-time prekeys', async () => {
      await alice.crypto.setup();

      expect(alice.crypto.isInitialized()).toBe(true);
      expect(alice.crypto.getDeviceId()).toBe('alice-device');
      expect(directory.remaining('alice')).toBe(5);
      expect(alice.crypto.store.getState().prekeyCount).toBe(5);
      expect(alice.crypto.store.getState().isInitialized).toBe(true);
      expect(alice.crypto.getFingerprint()).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should reload the same identity from storage', async () => {
      await alice.crypto.setup();
      const identityKey = alice.crypto.getIdentityPublicKey();

      const restarted = createClient(directory, 'alice', alice.storage);
      await restarted.crypto.initialize();

      expect(restarted.crypto.isInitialized()).toBe(true);
      expect(restarted.crypto.getIdentityPublicKey()).toBe(identityKey);
      restarted.crypto.dispose();
    });

    it('should stay uninitialized when no keys are stored', async () => {
      await alice.crypto.initialize();

      expect(alice.crypto.isInitialized()).toBe(false);
      expect(() => alice.crypto.getDeviceId()).toThrow(NotInitializedError);
    });

    it('should share one run between concurrent setup calls', async () => {
      await Promise.all([alice.crypto.setup(), alice.crypto.setup()]);

      expect(directory.calls.registerKeys).toBe(1);
    });

    it('should refuse a second setup', async () => {
      await alice.crypto.setup();

      await expect(alice.crypto.setup()).rejects.toBeInstanceOf(SetupError);
    });

    it('should leave no local keys when registration fails', async () => {
      directory.failNext('registerKeys');

      await expect(alice.crypto.setup()).rejects.toThrow(
        'Registering keys with the directory failed'
      );
      expect(alice.crypto.isInitialized()).toBe(false);
      expect(await alice.storage.get(STORAGE_KEYS.KEY_BUNDLE)).toBeNull();
      expect(alice.crypto.store.getState().error).toBe(
        'Registering keys with the directory failed'
      );

      // A retry starts from scratch
      await alice.crypto.setup();
      expect(alice.crypto.isInitialized()).toBe(true);
    });
  });

  describe('Direct messages', () => {
    beforeEach(async () => {
      await alice.crypto.setup();
      await bob.crypto.setup();
    });

    it('should let Bob decrypt what Alice encrypted', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      expect(message.oneTimePreKeyId).toBe('otp-1');
      expect(message.recipientIdentityKeyId).toBe('ik-1');
      expect(base64ToBytes(message.nonce)).toHaveLength(12);
      expect(base64ToBytes(message.ephemeralPublicKey)).toHaveLength(32);
      // 5 bytes of text plus the 16-byte tag
      expect(base64ToBytes(message.ciphertext)).toHaveLength(21);

      const plaintext = await bob.crypto.decryptMessage(
        'alice',
        alice.crypto.getIdentityPublicKey(),
        message
      );
      expect(plaintext).toBe('hello');
    });

    it('should let Bob answer Alice', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hi bob');
      await bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), message);

      const reply = await bob.crypto.encryptMessage('alice', 'hi alice ✓');
      const plaintext = await alice.crypto.decryptMessage(
        'bob',
        bob.crypto.getIdentityPublicKey(),
        reply
      );

      expect(plaintext).toBe('hi alice ✓');
    });

    it('should consume the one-time prekey on both sides', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      expect(directory.consumed).toEqual(['otp-1']);
      expect(directory.remaining('bob')).toBe(4);

      await bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), message);
      const raw = await bob.storage.get(STORAGE_KEYS.KEY_BUNDLE);
      expect(raw).not.toBeNull();
      expect(raw).not.toContain('"otp-1"');
      expect(raw).toContain('"otp-2"');
    });

    it('should omit DH4 on a cached bundle instead of reusing the prekey', async () => {
      const first = await alice.crypto.encryptMessage('bob', 'one');
      const second = await alice.crypto.encryptMessage('bob', 'two');

      expect(first.oneTimePreKeyId).toBe('otp-1');
      expect(second.oneTimePreKeyId).toBeUndefined();
      expect(directory.calls.getPreKeyBundle).toBe(1);

      const identityKey = alice.crypto.getIdentityPublicKey();
      expect(await bob.crypto.decryptMessage('alice', identityKey, first)).toBe('one');
      expect(await bob.crypto.decryptMessage('alice', identityKey, second)).toBe('two');
    });

    it('should fall back to three DH outputs when the pool is empty', async () => {
      const carol = createClient(directory, 'carol');
      await carol.crypto.setup();

      // logout() drops the bundle cache, so every message fetches afresh
      for (let i = 0; i < 5; i++) {
        await carol.crypto.encryptMessage('bob', 'drain');
        carol.crypto.logout();
      }
      expect(directory.remaining('bob')).toBe(0);

      const message = await alice.crypto.encryptMessage('bob', 'still works');
      expect(message.oneTimePreKeyId).toBeUndefined();
      expect(
        await bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), message)
      ).toBe('still works');

      carol.crypto.dispose();
    });

    it('should reject a replayed message whose prekey was consumed', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'once');
      const identityKey = alice.crypto.getIdentityPublicKey();
      await bob.crypto.decryptMessage('alice', identityKey, message);

      await expect(bob.crypto.decryptMessage('alice', identityKey, message)).rejects.toThrow(
        'One-time prekey otp-1 is not available on this device'
      );
    });

    it('should decrypt only one of two concurrent deliveries', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'once');
      const identityKey = alice.crypto.getIdentityPublicKey();

      const results = await Promise.allSettled([
        bob.crypto.decryptMessage('alice', identityKey, message),
        bob.crypto.decryptMessage('alice', identityKey, message),
      ]);

      expect(results[0]).toEqual({ status: 'fulfilled', value: 'once' });
      expect(results[1]?.status).toBe('rejected');
      if (results[1]?.status === 'rejected') {
        expect(results[1].reason).toBeInstanceOf(KeyAgreementError);
        expect(results[1].reason).toHaveProperty(
          'message',
          'One-time prekey otp-1 is not available on this device'
        );
      }
    });

    it('should keep the prekey when decryption fails', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');
      const identityKey = alice.crypto.getIdentityPublicKey();
      const bytes = base64ToBytes(message.ciphertext);
      bytes[0] = (bytes[0] ?? 0) ^ 0x01;

      await expect(
        bob.crypto.decryptMessage('alice', identityKey, {
          ...message,
          ciphertext: bytesToBase64(bytes),
        })
      ).rejects.toBeInstanceOf(DecryptionFailure);
      expect(await bob.crypto.decryptMessage('alice', identityKey, message)).toBe('hello');
    });

    it('should keep the prekey when the sender record is corrupt', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');
      const identityKey = alice.crypto.getIdentityPublicKey();
      const recordKey = `${STORAGE_KEYS.PEER_IDENTITY_PREFIX}alice`;
      await bob.storage.set(recordKey, '{not json');

      await expect(
        bob.crypto.decryptMessage('alice', identityKey, message)
      ).rejects.toBeInstanceOf(TrustRecordError);

      await bob.storage.delete(recordKey);
      expect(await bob.crypto.decryptMessage('alice', identityKey, message)).toBe('hello');
    });

    it('should fail decryption of a tampered ciphertext', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');
      const bytes = base64ToBytes(message.ciphertext);
      bytes[0] = (bytes[0] ?? 0) ^ 0x01;

      await expect(
        bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), {
          ...message,
          ciphertext: bytesToBase64(bytes),
        })
      ).rejects.toBeInstanceOf(DecryptionFailure);
    });

    it('should fail decryption under the wrong sender identity', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      await expect(
        bob.crypto.decryptMessage('alice', bob.crypto.getIdentityPublicKey(), message)
      ).rejects.toBeInstanceOf(DecryptionFailure);
    });

    it('should reject a malformed envelope', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      await expect(
        bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), {
          ...message,
          nonce: 'not base64!',
        })
      ).rejects.toThrow('Malformed encrypted message');
    });

    it('should reject a message addressed to another identity key', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      const error = await bob.crypto
        .decryptMessage('alice', alice.crypto.getIdentityPublicKey(), {
          ...message,
          recipientIdentityKeyId: 'ik-9',
        })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(KeyAgreementError);
      expect(error).toHaveProperty('code', E2EEErrorCode.KEY_AGREEMENT_FAILED);
    });

    it('should record no identity when the signed prekey does not verify', async () => {
      const dave = createClient(directory, 'dave', new MemorySecureStorage(), {
        directory: tamperingClient(directory, 'dave', (bundle) => ({
          ...bundle,
          signed_prekey_signature: bytesToBase64(new Uint8Array(64)),
        })),
      });
      await dave.crypto.setup();

      await expect(dave.crypto.encryptMessage('bob', 'hello')).rejects.toThrow(
        'Signed prekey signature does not verify'
      );
      expect(await dave.storage.get(`${STORAGE_KEYS.PEER_IDENTITY_PREFIX}bob`)).toBeNull();
      expect(dave.crypto.store.getState().identityWarnings).toEqual([]);

      dave.crypto.dispose();
    });

    it('should reject a bundle signed by a key other than the pinned one', async () => {
      const impostor = formatForRegistration(
        await new KeyBundleGenerator({ keyIds: createSequentialKeyIds() }).generateKeyBundle(
          'mallory-device',
          0
        )
      );
      let forge = false;
      const dave = createClient(directory, 'dave', new MemorySecureStorage(), {
        directory: tamperingClient(directory, 'dave', (bundle) =>
          forge
            ? {
                ...bundle,
                identity_signing_key: impostor.identity_signing_key,
                signed_prekey: impostor.signed_prekey.public_key,
                signed_prekey_signature: impostor.signed_prekey.signature,
              }
            : bundle
        ),
      });
      await dave.crypto.setup();
      await dave.crypto.encryptMessage('bob', 'pins the signing key');

      forge = true;
      dave.crypto.logout();

      await expect(dave.crypto.encryptMessage('bob', 'hello')).rejects.toThrow(
        'Identity signing key for bob does not match the pinned key'
      );
      dave.crypto.dispose();
    });

    it('should fail when the recipient is unknown to the directory', async () => {
      await expect(alice.crypto.encryptMessage('nobody', 'hello')).rejects.toThrow(
        'No bundle for nobody'
      );
    });
  });

  describe('Identity verification', () => {
    beforeEach(async () => {
      await alice.crypto.setup();
      await bob.crypto.setup();
    });

    it('should give both sides the same safety number', async () => {
      const fromAlice = await alice.crypto.getSafetyNumber('bob');
      const fromBob = await bob.crypto.getSafetyNumber('alice');

      expect(fromAlice).toMatch(/^\d{5}( \d{5}){11}$/);
      expect(fromAlice).toBe(fromBob);
    });

    it('should not use up a one-time prekey on the next message', async () => {
      await alice.crypto.getSafetyNumber('bob');
      const message = await alice.crypto.encryptMessage('bob', 'hello');

      // The peek fetched otp-1 and dropped it; the cached bundle has none
      expect(directory.consumed).toEqual(['otp-1']);
      expect(message.oneTimePreKeyId).toBeUndefined();
    });

    it('should report trust status for a peer', async () => {
      await alice.crypto.encryptMessage('bob', 'hello');

      expect(await alice.crypto.getIdentityStatus('bob')).toEqual({
        hasStoredIdentity: true,
        identityMatches: true,
        isVerified: false,
        trustLevel: TrustLevel.TOFU,
        previousIdentityKey: undefined,
      });

      await alice.crypto.markIdentityVerified('bob');
      expect((await alice.crypto.getIdentityStatus('bob')).isVerified).toBe(true);
      expect(directory.calls.getPreKeyBundle).toBe(1);
    });

    it('should warn when a peer identity key changes', async () => {
      const message = await alice.crypto.encryptMessage('bob', 'hello');
      await bob.crypto.decryptMessage('alice', alice.crypto.getIdentityPublicKey(), message);

      // Alice reinstalls and writes again
      alice.crypto.dispose();
      const reinstalled = createClient(directory, 'alice', new MemorySecureStorage(), {
        deviceId: 'alice-device-2',
      });
      await reinstalled.crypto.setup();
      const next = await reinstalled.crypto.encryptMessage('bob', 'new phone');

      expect(
        await bob.crypto.decryptMessage('alice', reinstalled.crypto.getIdentityPublicKey(), next)
      ).toBe('new phone');
      const warnings = bob.crypto.store.getState().identityWarnings;
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.userId).toBe('alice');
      expect(warnings[0]?.previousKey).toBe(alice.crypto.getIdentityPublicKey());
      expect(warnings[0]?.currentKey).toBe(reinstalled.crypto.getIdentityPublicKey());

      await bob.crypto.markIdentityVerified('alice');
      expect(bob.crypto.store.getState().identityWarnings).toHaveLength(0);
      const record = await bob.storage.get(`${STORAGE_KEYS.PEER_IDENTITY_PREFIX}alice`);
      expect(record).toContain(`"trustLevel":"${TrustLevel.VERIFIED}"`);

      reinstalled.crypto.dispose();
    });
  });

  describe('Prekeys', () => {
    beforeEach(async () => {
      await bob.crypto.setup();
    });

    it('should report the directory count', async () => {
      expect(await bob.crypto.getPrekeyCount()).toBe(5);
    });

    it('should upload more prekeys and keep their private halves', async () => {
      const total = await bob.crypto.uploadMorePrekeys(3);

      expect(total).toBe(8);
      expect(directory.remaining('bob')).toBe(8);
      const raw = await bob.storage.get(STORAGE_KEYS.KEY_BUNDLE);
      expect(raw).toContain('"otp-8"');
    });

    it('should top the pool up to the high-water mark', async () => {
      const uploaded = await bob.crypto.checkPrekeys();

      expect(uploaded).toBe(95);
      expect(directory.remaining('bob')).toBe(100);
      expect(bob.crypto.store.getState().prekeyCount).toBe(100);
    });
  });

  describe('Devices', () => {
    beforeEach(async () => {
      await alice.crypto.setup();
    });

    it('should list registered devices', async () => {
      const devices = await alice.crypto.listDevices();

      expect(devices).toEqual([
        { device_id: 'alice-device', created_at: '2024-01-01T00:00:00.000Z' },
      ]);
    });

    it('should wipe local keys when the active device is revoked', async () => {
      await alice.crypto.revokeDevice(alice.crypto.getDeviceId());

      expect(alice.crypto.isInitialized()).toBe(false);
      expect(alice.crypto.store.getState().deviceId).toBeNull();
      expect(await alice.storage.get(STORAGE_KEYS.KEY_BUNDLE)).toBeNull();
      expect(await alice.crypto.listDevices()).toEqual([]);
      await expect(alice.crypto.encryptMessage('bob', 'hello')).rejects.toBeInstanceOf(
        NotInitializedError
      );
    });

    it('should keep local keys when revocation fails', async () => {
      directory.failNext('revokeDevice');

      await expect(alice.crypto.revokeDevice('alice-device')).rejects.toBeInstanceOf(
        RevocationError
      );
      expect(alice.crypto.isInitialized()).toBe(true);
      expect(await alice.storage.get(STORAGE_KEYS.KEY_BUNDLE)).not.toBeNull();
    });

    it('should reset to a state that can be set up again', async () => {
      await alice.crypto.reset();

      expect(alice.crypto.isInitialized()).toBe(false);
      expect(directory.remaining('alice')).toBe(0);

      await alice.crypto.setup();
      expect(alice.crypto.isInitialized()).toBe(true);
    });
  });
});
