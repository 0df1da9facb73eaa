import { z } from 'zod';
import {
  RETRY,
  dataEnvelope,
  delay,
  deviceListSchema,
  preKeyCountSchema,
  registerKeysResultSchema,
  serverPrekeyBundleSchema,
  uploadPreKeysResultSchema,
  type DeviceInfo,
  type PreKeyCount,
  type PreKeyUpload,
  type RegisterKeysResult,
  type RegistrationPayload,
  type ServerPrekeyBundle,
  type UploadPreKeysResult,
} from '@veilpost/shared';
import { DirectoryError, InvalidBundleError } from '../crypto/errors.js';
import { config } from './env.js';
import { directoryLogger } from './logger.js';

/**
 * API Base URL - Uses environment configuration.
 * See env.ts for how this is resolved from environment variables or defaults.
 */
const API_BASE_URL = config.apiUrl;

const envelopeSchema = dataEnvelope(z.unknown());

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ListDevicesOptions extends RequestOptions {
  /** Another user's devices; defaults to the caller's own */
  userId?: string;
}

/**
 * Everything the crypto module needs from the key directory.
 * Implemented over HTTP by ApiClient; tests use an in-process fake.
 */
export interface KeyDirectoryClient {
  registerKeys(payload: RegistrationPayload, options?: RequestOptions): Promise<RegisterKeysResult>;
  uploadPreKeys(payload: PreKeyUpload, options?: RequestOptions): Promise<UploadPreKeysResult>;
  getPreKeyCount(options?: RequestOptions): Promise<PreKeyCount>;
  getPreKeyBundle(userId: string, options?: RequestOptions): Promise<ServerPrekeyBundle>;
  listDevices(options?: ListDevicesOptions): Promise<DeviceInfo[]>;
  revokeDevice(deviceId: string, options?: RequestOptions): Promise<void>;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoff: number;
}

export interface ApiClientOptions {
  fetch?: typeof fetch;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const parseJson = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const extractErrorMessage = (payload: unknown): string | null => {
  if (!isObject(payload)) return null;
  if (isObject(payload.error) && typeof payload.error.message === 'string') {
    return payload.error.message;
  }
  return typeof payload.message === 'string' ? payload.message : null;
};

class ApiClient implements KeyDirectoryClient {
  private baseUrl: string;
  private getAccessToken: () => string | null;
  private onUnauthorized: () => void;
  private fetchImpl: typeof fetch;
  private retry: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    baseUrl: string,
    getAccessToken: () => string | null,
    onUnauthorized: () => void,
    options: ApiClientOptions = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.getAccessToken = getAccessToken;
    this.onUnauthorized = onUnauthorized;
    this.fetchImpl = options.fetch ?? fetch;
    this.retry = {
      maxAttempts: RETRY.MAX_ATTEMPTS,
      baseDelayMs: RETRY.BASE_DELAY_MS,
      backoff: RETRY.BACKOFF,
      ...options.retry,
    };
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Send a request, retrying network failures, 5xx and 429 with exponential
   * backoff. Returns the parsed JSON body (null when empty).
   */
  private async send(endpoint: string, options: RequestInit = {}): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    const method = options.method ?? 'GET';

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(url, options);
      } catch (error) {
        if (!(error instanceof DirectoryError)) throw error;
        if (!error.retryable || attempt >= this.retry.maxAttempts || options.signal?.aborted) {
          throw error;
        }
        const wait = this.retry.baseDelayMs * this.retry.backoff ** (attempt - 1);
        directoryLogger.warn(
          `${method} ${endpoint} failed (${error.message}), retrying in ${wait}ms`
        );
        await this.sleep(wait);
        if (options.signal?.aborted) {
          throw new DirectoryError(`${method} ${endpoint} aborted`, { cause: options.signal.reason });
        }
      }
    }
  }

  private async attempt(url: string, options: RequestInit): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const token = this.getAccessToken();
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...options, headers });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DirectoryError(`Network error calling ${url}: ${reason}`, { cause: error });
    }

    if (response.status === 401) {
      this.onUnauthorized();
      throw new DirectoryError('Unauthorized', { status: 401 });
    }

    const payload = await parseJson(response);
    if (!response.ok) {
      const message = extractErrorMessage(payload) ?? `Request failed with status ${response.status}`;
      throw new DirectoryError(message, { status: response.status });
    }
    return payload;
  }

  private async request<T>(
    endpoint: string,
    options: RequestInit,
    schema: z.ZodSchema<T>
  ): Promise<T> {
    const envelope = envelopeSchema.safeParse(await this.send(endpoint, options));
    const parsed = schema.safeParse(envelope.success ? envelope.data.data : undefined);
    if (!parsed.success) {
      throw new DirectoryError(`Malformed response from ${endpoint}`, { cause: parsed.error });
    }
    return parsed.data;
  }

  // ==================== E2EE Keys ====================

  async registerKeys(payload: RegistrationPayload, options: RequestOptions = {}) {
    return this.request(
      '/e2ee/keys',
      { method: 'POST', body: JSON.stringify(payload), signal: options.signal },
      registerKeysResultSchema
    );
  }

  async uploadPreKeys(payload: PreKeyUpload, options: RequestOptions = {}) {
    return this.request(
      '/e2ee/prekeys',
      { method: 'POST', body: JSON.stringify(payload), signal: options.signal },
      uploadPreKeysResultSchema
    );
  }

  async getPreKeyCount(options: RequestOptions = {}) {
    return this.request('/e2ee/prekeys/count', { signal: options.signal }, preKeyCountSchema);
  }

  /**
   * A malformed bundle is a key-agreement failure, not a transport one.
   */
  async getPreKeyBundle(userId: string, options: RequestOptions = {}): Promise<ServerPrekeyBundle> {
    const endpoint = `/e2ee/bundle/${encodeURIComponent(userId)}`;
    const envelope = envelopeSchema.safeParse(await this.send(endpoint, { signal: options.signal }));
    const parsed = serverPrekeyBundleSchema.safeParse(
      envelope.success ? envelope.data.data : undefined
    );
    if (!parsed.success) {
      throw new InvalidBundleError(`Directory returned a malformed bundle for ${userId}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async listDevices(options: ListDevicesOptions = {}) {
    const query = options.userId ? `?user_id=${encodeURIComponent(options.userId)}` : '';
    return this.request(`/e2ee/devices${query}`, { signal: options.signal }, deviceListSchema);
  }

  async revokeDevice(deviceId: string, options: RequestOptions = {}): Promise<void> {
    await this.send(`/e2ee/keys/${encodeURIComponent(deviceId)}`, {
      method: 'DELETE',
      signal: options.signal,
    });
  }
}

// Singleton instance
let apiClient: ApiClient | null = null;

export function initApiClient(
  getAccessToken: () => string | null,
  onUnauthorized: () => void,
  options: ApiClientOptions = {}
): ApiClient {
  apiClient = new ApiClient(API_BASE_URL, getAccessToken, onUnauthorized, options);
  return apiClient;
}

export function getApiClient(): ApiClient {
  if (!apiClient) {
    throw new Error('API client accessed before initApiClient()');
  }
  return apiClient;
}

export function isApiClientInitialized(): boolean {
  return apiClient !== null;
}

export { ApiClient };
