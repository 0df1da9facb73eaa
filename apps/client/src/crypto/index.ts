/**
 * Veilpost - Crypto Module
 *
 * End-to-end encryption for direct messages.
 *
 * Usage:
 * ```typescript
 * import { createE2EECrypto } from '@veilpost/client';
 *
 * const e2ee = createE2EECrypto({ userId, storage, directory: getApiClient() });
 * await e2ee.initialize();
 * if (!e2ee.isInitialized()) await e2ee.setup();
 *
 * const message = await e2ee.encryptMessage(peerId, 'hello');
 * ```
 */

export { createE2EECrypto, E2EECryptoImpl } from './E2EECrypto.js';
export type { E2EECryptoOptions } from './E2EECrypto.js';

// Types (exported for use by other modules)
export type {
  E2EECrypto,
  KeyBundle,
  KeyIdFactory,
  Clock,
  IdentityKeyPair,
  SignedPreKey,
  OneTimePreKey,
} from './types.js';

// Storage key constants
export { STORAGE_KEYS } from './types.js';

// Errors
export {
  E2EEError,
  SetupError,
  NotInitializedError,
  DirectoryError,
  KeyAgreementError,
  InvalidBundleError,
  DecryptionFailure,
  RevocationError,
  TrustRecordError,
  isRetryable,
} from './errors.js';

// Safety numbers and trust
export {
  generateSafetyNumber,
  formatSafetyNumberLines,
  safetyNumbersMatch,
  fingerprint,
} from './SafetyNumber.js';
export type { IdentityStatus, StoredIdentity } from './IdentityTrustStore.js';

// Building blocks (for testing/debugging)
export { KeyBundleGenerator, createSequentialKeyIds } from './KeyBundleGenerator.js';
export { LocalKeyStore, createLocalKeyStore } from './LocalKeyStore.js';
export { formatForRegistration, formatPreKeysForUpload } from './BundleFormatter.js';
export { PreKeyBundleCache } from './PreKeyBundleCache.js';
export { DeviceLifecycleManager } from './DeviceLifecycleManager.js';

// Directory client, storage backends and logging
export { ApiClient, initApiClient, getApiClient, isApiClientInitialized } from '../lib/api.js';
export type { KeyDirectoryClient, ApiClientOptions, RetryPolicy } from '../lib/api.js';
export { MemorySecureStorage, EncryptedFileStorage } from '../lib/secureStorage.js';
export type { SecureStorage } from '../lib/secureStorage.js';
export { Logger, createLogger, createConsoleSink } from '../lib/logger.js';
export type { LogRecord, LogSink, LoggerOptions } from '../lib/logger.js';
