/**
 * Veilpost - Device Lifecycle Manager
 *
 * Device listing and revocation, plus one-time prekey replenishment:
 * a check every few minutes (and on app foreground) that tops the
 * directory's pool back up to the high-water mark once it drops below the
 * low-water mark.
 */

import { CRYPTO, type DeviceInfo, type UploadPreKeysResult } from '@veilpost/shared';
import type { KeyDirectoryClient } from '../lib/api.js';
import type { Logger } from '../lib/logger.js';
import type { E2EEStore } from '../stores/e2eeStore.js';
import { formatPreKeysForUpload } from './BundleFormatter.js';
import { RevocationError, describeError } from './errors.js';
import type { KeyBundleGenerator } from './KeyBundleGenerator.js';
import type { LocalKeyStore } from './LocalKeyStore.js';

export interface ReplenishmentConfig {
  lowWaterMark: number;
  highWaterMark: number;
  intervalMs: number;
}

export interface DeviceLifecycleManagerOptions {
  directory: KeyDirectoryClient;
  keyStore: LocalKeyStore;
  generator: KeyBundleGenerator;
  store: E2EEStore;
  logger: Logger;
  replenishment?: Partial<ReplenishmentConfig>;
  /** Called after this device's own keys were revoked and wiped. */
  onActiveDeviceRevoked?: () => void;
}

export class DeviceLifecycleManager {
  private readonly directory: KeyDirectoryClient;
  private readonly keyStore: LocalKeyStore;
  private readonly generator: KeyBundleGenerator;
  private readonly store: E2EEStore;
  private readonly logger: Logger;
  private readonly replenishment: ReplenishmentConfig;
  private readonly onActiveDeviceRevoked?: () => void;

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<number> | null = null;
  private abortController = new AbortController();

  constructor(options: DeviceLifecycleManagerOptions) {
    this.directory = options.directory;
    this.keyStore = options.keyStore;
    this.generator = options.generator;
    this.store = options.store;
    this.logger = options.logger;
    this.onActiveDeviceRevoked = options.onActiveDeviceRevoked;
    this.replenishment = {
      lowWaterMark: CRYPTO.PREKEY_LOW_WATER_MARK,
      highWaterMark: CRYPTO.PREKEY_HIGH_WATER_MARK,
      intervalMs: CRYPTO.REPLENISH_INTERVAL_MS,
      ...options.replenishment,
    };
  }

  // ────────────────── Replenishment ──────────────────

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Check immediately, then every `intervalMs`.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.replenishment.intervalMs);
    this.tick();
  }

  /**
   * Cancel the timer and abort directory requests still in flight.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.abortController.abort();
    this.abortController = new AbortController();
  }

  /** App came back to the foreground. */
  onForeground(): void {
    if (this.timer) this.tick();
  }

  /**
   * Top the directory's pool up if it is below the low-water mark.
   * Overlapping calls share one run. Resolves to the number uploaded.
   */
  checkAndReplenish(): Promise<number> {
    if (!this.inFlight) {
      this.inFlight = this.replenish().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Generate `count` prekeys, keep their private halves, upload the public ones.
   * A rejected upload drops the batch's private halves again.
   * Resolves to the directory's new total.
   */
  async uploadPreKeys(count: number = CRYPTO.UPLOAD_BATCH_SIZE): Promise<number> {
    const keys = await this.generator.generateOneTimePreKeys(count);
    if (keys.length === 0) {
      const { count: remaining } = await this.directory.getPreKeyCount({
        signal: this.abortController.signal,
      });
      return remaining;
    }
    await this.keyStore.addOneTimePreKeys(keys);
    let result: UploadPreKeysResult;
    try {
      result = await this.directory.uploadPreKeys(formatPreKeysForUpload(keys), {
        signal: this.abortController.signal,
      });
    } catch (error) {
      await this.keyStore.removeOneTimePreKeys(keys.map((key) => key.keyId));
      throw error;
    }
    this.store.getState().setPrekeyCount(result.total);
    this.logger.info(`Uploaded ${result.uploaded} one-time prekeys (${result.total} available)`);
    return result.total;
  }

  private async replenish(): Promise<number> {
    const { count } = await this.directory.getPreKeyCount({
      signal: this.abortController.signal,
    });
    this.store.getState().setPrekeyCount(count);
    if (count >= this.replenishment.lowWaterMark) return 0;

    const needed = this.replenishment.highWaterMark - count;
    this.logger.info(`Prekey pool low (${count}), generating ${needed}`);
    await this.uploadPreKeys(needed);
    return needed;
  }

  private tick(): void {
    const { signal } = this.abortController;
    this.checkAndReplenish().catch((error: unknown) => {
      if (signal.aborted) return;
      this.logger.warn(`Prekey replenishment failed: ${describeError(error)}`);
    });
  }

  // ────────────────── Devices ──────────────────

  async listDevices(userId?: string): Promise<DeviceInfo[]> {
    try {
      return await this.directory.listDevices({ userId, signal: this.abortController.signal });
    } catch (error) {
      throw new RevocationError('Could not list devices', { cause: error });
    }
  }

  /**
   * Delete a device's published keys. Revoking this device also stops
   * replenishment and wipes local keys; nothing local changes on failure.
   */
  async revokeDevice(deviceId: string): Promise<void> {
    try {
      await this.directory.revokeDevice(deviceId, { signal: this.abortController.signal });
    } catch (error) {
      throw new RevocationError(`Could not revoke device ${deviceId}`, { cause: error });
    }

    if (deviceId !== this.store.getState().deviceId) {
      this.logger.info(`Revoked device ${deviceId}`);
      return;
    }

    this.stop();
    await this.keyStore.clear();
    this.store.getState().reset();
    this.onActiveDeviceRevoked?.();
    this.logger.warn('This device was revoked; local keys erased');
  }
}
