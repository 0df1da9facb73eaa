/**
 * Veilpost - Identity Trust Store
 *
 * Trust-on-first-use records of peers' identity keys, kept in SecureStorage
 * under `peer_identity:<userId>`. A key that differs from the recorded one
 * is reported as changed and loses its verified status.
 *
 * The Ed25519 key that signs a peer's prekeys is pinned beside its identity
 * key the first time both are seen together.
 */

import { z } from 'zod';
import { TrustLevel, base64String } from '@veilpost/shared';
import type { SecureStorage } from '../lib/secureStorage.js';
import { TrustRecordError } from './errors.js';
import { STORAGE_KEYS, type Clock } from './types.js';

const storedIdentitySchema = z.object({
  userId: z.string(),
  identityKey: base64String,
  signingKey: base64String.optional(),
  firstSeen: z.string(),
  trustLevel: z.nativeEnum(TrustLevel),
  verifiedAt: z.string().optional(),
});

/**
 * Stored identity record
 */
export type StoredIdentity = z.infer<typeof storedIdentitySchema>;

export interface IdentityCheck {
  isNew: boolean;
  hasChanged: boolean;
  previousKey?: string;
}

/**
 * Identity verification status
 */
export interface IdentityStatus {
  /** Whether we have a stored identity for this user */
  hasStoredIdentity: boolean;

  /** Whether the current identity matches stored */
  identityMatches: boolean;

  /** Whether user has explicitly verified this identity */
  isVerified: boolean;

  trustLevel?: TrustLevel;

  /** Previous identity key if changed (for UI warning) */
  previousIdentityKey?: string;
}

export class IdentityTrustStore {
  private readonly clock: Clock;

  constructor(
    private readonly storage: SecureStorage,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Record a peer's identity key, or compare it with the recorded one.
   * `signingKey` is pinned when given and none is recorded for this identity.
   */
  async checkIdentity(
    userId: string,
    identityKey: string,
    signingKey?: string
  ): Promise<IdentityCheck> {
    const existing = await this.getStoredIdentity(userId);
    const pin = signingKey ? { signingKey } : {};

    if (!existing) {
      await this.write({
        userId,
        identityKey,
        ...pin,
        firstSeen: new Date(this.clock()).toISOString(),
        trustLevel: TrustLevel.TOFU,
      });
      return { isNew: true, hasChanged: false };
    }

    if (existing.identityKey === identityKey) {
      if (signingKey && !existing.signingKey) {
        await this.write({ ...existing, signingKey });
      }
      return { isNew: false, hasChanged: false };
    }

    // Identity changed. Verification and the old pin no longer apply.
    await this.write({
      userId,
      identityKey,
      ...pin,
      firstSeen: existing.firstSeen,
      trustLevel: TrustLevel.CHANGED,
    });
    return { isNew: false, hasChanged: true, previousKey: existing.identityKey };
  }

  /**
   * Signing key pinned for `identityKey`; `null` when the recorded identity
   * differs or nothing is pinned yet.
   */
  async getPinnedSigningKey(userId: string, identityKey: string): Promise<string | null> {
    const stored = await this.getStoredIdentity(userId);
    if (!stored || stored.identityKey !== identityKey) return null;
    return stored.signingKey ?? null;
  }

  async getStoredIdentity(userId: string): Promise<StoredIdentity | null> {
    const raw = await this.storage.get(this.keyFor(userId));
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new TrustRecordError(`Stored identity for ${userId} is corrupt`, { cause: error });
    }
    const parsed = storedIdentitySchema.safeParse(json);
    if (!parsed.success) {
      throw new TrustRecordError(`Stored identity for ${userId} is corrupt`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getStatus(userId: string, currentIdentityKey: string): Promise<IdentityStatus> {
    const stored = await this.getStoredIdentity(userId);
    if (!stored) {
      return { hasStoredIdentity: false, identityMatches: false, isVerified: false };
    }

    const matches = stored.identityKey === currentIdentityKey;
    return {
      hasStoredIdentity: true,
      identityMatches: matches,
      isVerified: matches && stored.trustLevel === TrustLevel.VERIFIED,
      trustLevel: stored.trustLevel,
      previousIdentityKey: matches ? undefined : stored.identityKey,
    };
  }

  /**
   * Mark the recorded identity as verified out of band.
   */
  async markVerified(userId: string): Promise<void> {
    const stored = await this.getStoredIdentity(userId);
    if (!stored) {
      throw new Error(`No stored identity for user ${userId}`);
    }
    await this.write({
      ...stored,
      trustLevel: TrustLevel.VERIFIED,
      verifiedAt: new Date(this.clock()).toISOString(),
    });
  }

  private keyFor(userId: string): string {
    return `${STORAGE_KEYS.PEER_IDENTITY_PREFIX}${userId}`;
  }

  private async write(record: StoredIdentity): Promise<void> {
    await this.storage.set(this.keyFor(record.userId), JSON.stringify(record));
  }
}
