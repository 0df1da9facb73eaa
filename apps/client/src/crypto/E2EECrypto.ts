/**
 * Veilpost - Crypto Implementation
 *
 * Main crypto facade over the key store, the X3DH engine, the message
 * cipher, the bundle cache and the device lifecycle manager. One instance
 * per logged-in session; logout() tears it down.
 *
 * SECURITY:
 * - Private keys never leave the device
 * - The directory cannot decrypt any message
 * - Every failure is a typed E2EEError; there is no plaintext fallback
 */

import {
  CRYPTO,
  base64ToBytes,
  bytesToBase64,
  encryptedMessageSchema,
  type DeviceInfo,
  type EncryptedMessage,
  type ServerPrekeyBundle,
} from '@veilpost/shared';
import type { KeyDirectoryClient } from '../lib/api.js';
import { cryptoLogger, type Logger } from '../lib/logger.js';
import type { SecureStorage } from '../lib/secureStorage.js';
import { wipe } from '../lib/sodiumHelpers.js';
import { createE2EEStore, type E2EEStore } from '../stores/e2eeStore.js';
import { formatForRegistration } from './BundleFormatter.js';
import { DeviceLifecycleManager, type ReplenishmentConfig } from './DeviceLifecycleManager.js';
import {
  DecryptionFailure,
  E2EEError,
  KeyAgreementError,
  NotInitializedError,
  SetupError,
  describeError,
} from './errors.js';
import { IdentityTrustStore, type IdentityStatus } from './IdentityTrustStore.js';
import { KeyBundleGenerator } from './KeyBundleGenerator.js';
import { LocalKeyStore } from './LocalKeyStore.js';
import { decryptText, encryptText } from './MessageCipher.js';
import { PreKeyBundleCache } from './PreKeyBundleCache.js';
import { fingerprint, generateSafetyNumber } from './SafetyNumber.js';
import type { Clock, E2EECrypto, KeyBundle, KeyIdFactory, OneTimePreKey } from './types.js';
import { decodePublicKey, initiateKeyAgreement, respondToKeyAgreement } from './X3DH.js';

export interface E2EECryptoOptions {
  /** The logged-in user; one side of every safety number */
  userId: string;
  storage: SecureStorage;
  directory: KeyDirectoryClient;
  clock?: Clock;
  logger?: Logger;
  keyIds?: KeyIdFactory;
  /** Fixed device id; generated at setup otherwise */
  deviceId?: string;
  /** One-time prekeys generated at setup */
  initialPrekeyCount?: number;
  bundleCacheTtlMs?: number;
  replenishment?: Partial<ReplenishmentConfig>;
  /** Run the replenishment timer while initialized (default true) */
  autoReplenish?: boolean;
  store?: E2EEStore;
}

// ============================================================================
// E2EE CRYPTO IMPLEMENTATION
// ============================================================================

/**
 * Main crypto implementation.
 * This is the only crypto interface exposed to the rest of the app.
 */
export class E2EECryptoImpl implements E2EECrypto {
  readonly store: E2EEStore;

  private readonly userId: string;
  private readonly clock: Clock;
  private readonly directory: KeyDirectoryClient;
  private readonly logger: Logger;
  private readonly keyStore: LocalKeyStore;
  private readonly trustStore: IdentityTrustStore;
  private readonly generator: KeyBundleGenerator;
  private readonly bundleCache: PreKeyBundleCache;
  private readonly lifecycle: DeviceLifecycleManager;
  private readonly fixedDeviceId?: string;
  private readonly initialPrekeyCount: number;
  private readonly autoReplenish: boolean;

  private bundle: KeyBundle | null = null;
  private setupInFlight: Promise<void> | null = null;
  private abortController = new AbortController();

  constructor(options: E2EECryptoOptions) {
    const clock = options.clock ?? Date.now;
    this.clock = clock;
    this.userId = options.userId;
    this.directory = options.directory;
    this.logger = options.logger ?? cryptoLogger;
    this.store = options.store ?? createE2EEStore();
    this.fixedDeviceId = options.deviceId;
    this.initialPrekeyCount = options.initialPrekeyCount ?? CRYPTO.INITIAL_PREKEY_COUNT;
    this.autoReplenish = options.autoReplenish ?? true;

    this.keyStore = new LocalKeyStore(options.storage);
    this.trustStore = new IdentityTrustStore(options.storage, { clock });
    this.generator = new KeyBundleGenerator({ keyIds: options.keyIds, clock });
    this.bundleCache = new PreKeyBundleCache(options.directory, {
      ttlMs: options.bundleCacheTtlMs,
      clock,
      logger: this.logger.child('cache'),
    });
    this.lifecycle = new DeviceLifecycleManager({
      directory: options.directory,
      keyStore: this.keyStore,
      generator: this.generator,
      store: this.store,
      logger: this.logger.child('devices'),
      replenishment: options.replenishment,
      onActiveDeviceRevoked: () => this.dropSession(),
    });
  }

  // ==================== INITIALIZATION ====================

  /**
   * Load local keys. Leaves the module uninitialized when there are none.
   */
  async initialize(): Promise<void> {
    if (this.bundle) return;
    this.store.getState().setLoading(true);
    try {
      const bundle = await this.keyStore.load();
      if (!bundle) {
        this.store.getState().setLoading(false);
        this.logger.info('No local keys; setup() required');
        return;
      }
      await this.activate(bundle);
      this.logger.info(`Loaded keys for device ${bundle.deviceId}`);
    } catch (error) {
      this.store.getState().setError(describeError(error));
      throw error;
    }
  }

  /**
   * Generate, persist and register this device's keys. Concurrent calls
   * share one run; calling again after success fails.
   */
  setup(): Promise<void> {
    if (this.setupInFlight) return this.setupInFlight;
    if (this.bundle) {
      return Promise.reject(new SetupError('E2EE is already set up on this device'));
    }
    this.setupInFlight = this.runSetup().finally(() => {
      this.setupInFlight = null;
    });
    return this.setupInFlight;
  }

  isInitialized(): boolean {
    return this.bundle !== null;
  }

  // ==================== IDENTITY ====================

  getDeviceId(): string {
    return this.requireBundle().deviceId;
  }

  getIdentityPublicKey(): string {
    return bytesToBase64(this.requireBundle().identity.dh.publicKey);
  }

  getFingerprint(): string {
    this.requireBundle();
    const value = this.store.getState().fingerprint;
    if (!value) throw new NotInitializedError();
    return value;
  }

  // ==================== DIRECT MESSAGES ====================

  async encryptMessage(recipientId: string, plaintext: string): Promise<EncryptedMessage> {
    const bundle = this.requireBundle();
    const remote = await this.bundleCache.getRecipientBundle(recipientId, {
      signal: this.abortController.signal,
    });
    await this.checkPinnedSigningKey(recipientId, remote);

    const agreement = await initiateKeyAgreement(bundle.identity, remote);
    try {
      await this.recordIdentity(recipientId, remote.identity_key, remote.identity_signing_key);
      const sealed = await encryptText(plaintext, agreement.sharedSecret);
      const message: EncryptedMessage = {
        ciphertext: bytesToBase64(sealed.ciphertext),
        ephemeralPublicKey: bytesToBase64(agreement.ephemeralPublicKey),
        recipientIdentityKeyId: agreement.recipientIdentityKeyId,
        nonce: bytesToBase64(sealed.nonce),
      };
      if (agreement.oneTimePreKeyId) {
        message.oneTimePreKeyId = agreement.oneTimePreKeyId;
      } else {
        this.logger.debug(`No one-time prekey for ${recipientId}; DH4 omitted`);
      }
      return message;
    } finally {
      wipe(agreement.sharedSecret);
    }
  }

  async decryptMessage(
    senderId: string,
    senderIdentityKey: string,
    message: EncryptedMessage
  ): Promise<string> {
    const bundle = this.requireBundle();

    const parsed = encryptedMessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new DecryptionFailure('Malformed encrypted message', { cause: parsed.error });
    }
    const envelope = parsed.data;
    if (envelope.recipientIdentityKeyId !== bundle.identity.keyId) {
      throw new KeyAgreementError(
        `Message is addressed to identity key ${envelope.recipientIdentityKeyId}`
      );
    }

    const senderKey = decodePublicKey(senderIdentityKey, 'sender identity key');
    const ephemeralKey = decodePublicKey(envelope.ephemeralPublicKey, 'ephemeral key');
    // Taken before deriving so a concurrent replay finds it gone.
    let oneTimePreKey: OneTimePreKey | null = null;
    if (envelope.oneTimePreKeyId) {
      oneTimePreKey = await this.keyStore.takeOneTimePreKey(envelope.oneTimePreKeyId);
      if (!oneTimePreKey) {
        throw new KeyAgreementError(
          `One-time prekey ${envelope.oneTimePreKeyId} is not available on this device`
        );
      }
    }

    try {
      const secret = await respondToKeyAgreement({
        identity: bundle.identity,
        signedPreKey: bundle.signedPreKey,
        oneTimePreKey,
        senderIdentityKey: senderKey,
        ephemeralPublicKey: ephemeralKey,
      });

      let plaintext: string;
      try {
        plaintext = await decryptText(
          base64ToBytes(envelope.ciphertext),
          base64ToBytes(envelope.nonce),
          secret
        );
      } finally {
        wipe(secret);
      }

      await this.recordIdentity(senderId, senderIdentityKey);
      return plaintext;
    } catch (error) {
      if (oneTimePreKey) {
        await this.keyStore.addOneTimePreKeys([oneTimePreKey]);
      }
      throw error;
    }
  }

  // ==================== VERIFICATION ====================

  async getSafetyNumber(userId: string): Promise<string> {
    const bundle = this.requireBundle();
    const remote = await this.bundleCache.peekRecipientBundle(userId, {
      signal: this.abortController.signal,
    });
    const remoteKey = decodePublicKey(remote.identity_key, 'identity key');
    return generateSafetyNumber(this.userId, bundle.identity.dh.publicKey, userId, remoteKey);
  }

  async getIdentityStatus(userId: string): Promise<IdentityStatus> {
    this.requireBundle();
    const remote = await this.bundleCache.peekRecipientBundle(userId, {
      signal: this.abortController.signal,
    });
    return this.trustStore.getStatus(userId, remote.identity_key);
  }

  async markIdentityVerified(userId: string): Promise<void> {
    this.requireBundle();
    await this.trustStore.markVerified(userId);
    this.store.getState().dismissIdentityWarning(userId);
  }

  // ==================== PREKEYS ====================

  async getPrekeyCount(): Promise<number> {
    this.requireBundle();
    const { count } = await this.directory.getPreKeyCount({
      signal: this.abortController.signal,
    });
    this.store.getState().setPrekeyCount(count);
    return count;
  }

  async uploadMorePrekeys(count: number = CRYPTO.UPLOAD_BATCH_SIZE): Promise<number> {
    this.requireBundle();
    return this.lifecycle.uploadPreKeys(count);
  }

  /** Run one replenishment check now. */
  async checkPrekeys(): Promise<number> {
    this.requireBundle();
    return this.lifecycle.checkAndReplenish();
  }

  /** App returned to the foreground. */
  onForeground(): void {
    this.lifecycle.onForeground();
  }

  // ==================== DEVICES ====================

  async listDevices(userId?: string): Promise<DeviceInfo[]> {
    return this.lifecycle.listDevices(userId);
  }

  async revokeDevice(deviceId: string): Promise<void> {
    await this.lifecycle.revokeDevice(deviceId);
  }

  // ==================== CLEANUP ====================

  async reset(): Promise<void> {
    const deviceId = this.bundle?.deviceId ?? this.store.getState().deviceId;
    this.lifecycle.stop();
    if (deviceId) {
      try {
        await this.directory.revokeDevice(deviceId);
      } catch (error) {
        this.logger.warn(`Could not revoke ${deviceId} during reset: ${describeError(error)}`);
      }
    }
    await this.keyStore.clear();
    this.dropSession();
    this.store.getState().reset();
    this.logger.info('Local E2EE state erased');
  }

  logout(): void {
    this.lifecycle.stop();
    this.abortController.abort();
    this.abortController = new AbortController();
    this.bundleCache.clear();
  }

  dispose(): void {
    this.logout();
  }

  // ==================== PRIVATE METHODS ====================

  private async runSetup(): Promise<void> {
    const state = this.store.getState();
    state.setLoading(true);
    try {
      const deviceId = this.fixedDeviceId ?? (await this.generator.generateDeviceId());
      const bundle = await this.generator.generateKeyBundle(deviceId, this.initialPrekeyCount);
      await this.keyStore.save(bundle);

      try {
        const result = await this.directory.registerKeys(formatForRegistration(bundle), {
          signal: this.abortController.signal,
        });
        this.store.getState().setPrekeyCount(result.one_time_prekey_count);
      } catch (error) {
        await this.keyStore.clear();
        throw new SetupError('Registering keys with the directory failed', { cause: error });
      }

      await this.activate(bundle);
      this.logger.info(`Device ${deviceId} set up with ${bundle.oneTimePreKeys.length} prekeys`);
    } catch (error) {
      this.store.getState().setError(describeError(error));
      if (error instanceof E2EEError) throw error;
      throw new SetupError('Setup failed', { cause: error });
    }
  }

  private async activate(bundle: KeyBundle): Promise<void> {
    const value = await fingerprint(bundle.identity.dh.publicKey);
    this.bundle = bundle;
    this.store.getState().setReady(bundle.deviceId, value);
    if (this.autoReplenish) {
      this.lifecycle.start();
    }
  }

  private dropSession(): void {
    this.bundle = null;
    this.bundleCache.clear();
  }

  private requireBundle(): KeyBundle {
    if (!this.bundle) throw new NotInitializedError();
    return this.bundle;
  }

  /**
   * A bundle for an identity key already on record must carry the signing
   * key pinned with it, or its signed prekey proves nothing.
   */
  private async checkPinnedSigningKey(userId: string, remote: ServerPrekeyBundle): Promise<void> {
    const pinned = await this.trustStore.getPinnedSigningKey(userId, remote.identity_key);
    if (pinned !== null && pinned !== remote.identity_signing_key) {
      throw new KeyAgreementError(
        `Identity signing key for ${userId} does not match the pinned key`
      );
    }
  }

  /**
   * Trust on first use. A changed key is surfaced, never blocking.
   */
  private async recordIdentity(
    userId: string,
    identityKey: string,
    signingKey?: string
  ): Promise<void> {
    const check = await this.trustStore.checkIdentity(userId, identityKey, signingKey);
    if (!check.hasChanged) return;
    this.logger.warn(`Identity key for ${userId} changed`);
    this.store.getState().addIdentityWarning({
      userId,
      previousKey: check.previousKey,
      currentKey: identityKey,
      detectedAt: this.clock(),
    });
  }
}

/**
 * Build a per-session crypto facade.
 */
export function createE2EECrypto(options: E2EECryptoOptions): E2EECryptoImpl {
  return new E2EECryptoImpl(options);
}
