/**
 * Veilpost - Safety Number Implementation
 *
 * Safety numbers let two users confirm out of band that they see the same
 * identity keys, which exposes a directory substituting keys.
 *
 * Computation:
 * 1. Order the two (userId, identityKey) pairs by user id (UTF-16 code
 *    units; identical ids fall back to key byte order)
 * 2. SHA-256( lowerId || lowerKey || higherId || higherKey ), ids UTF-8
 * 3. First 24 bytes → twelve big-endian 16-bit values → 5 digits each
 *
 * Both parties get the same 60 digits regardless of who computes.
 */

import { SAFETY_NUMBER, bytesToHex, compareBytes, concatBytes } from '@veilpost/shared';
import { sha256 } from '../lib/webCrypto.js';

interface Party {
  userId: string;
  identityKey: Uint8Array;
}

function orderParties(a: Party, b: Party): [Party, Party] {
  if (a.userId < b.userId) return [a, b];
  if (a.userId > b.userId) return [b, a];
  return compareBytes(a.identityKey, b.identityKey) <= 0 ? [a, b] : [b, a];
}

/**
 * Twelve space-separated groups of five digits.
 */
export async function generateSafetyNumber(
  userA: string,
  keyA: Uint8Array,
  userB: string,
  keyB: Uint8Array
): Promise<string> {
  const [lower, higher] = orderParties(
    { userId: userA, identityKey: keyA },
    { userId: userB, identityKey: keyB }
  );
  const encoder = new TextEncoder();
  const digest = await sha256(
    concatBytes(
      encoder.encode(lower.userId),
      lower.identityKey,
      encoder.encode(higher.userId),
      higher.identityKey
    )
  );

  const groups: string[] = [];
  for (let i = 0; i < SAFETY_NUMBER.GROUPS; i++) {
    const value = ((digest[i * 2] ?? 0) << 8) | (digest[i * 2 + 1] ?? 0);
    groups.push(value.toString().padStart(SAFETY_NUMBER.GROUP_DIGITS, '0'));
  }
  return groups.join(' ');
}

/**
 * Split a safety number into display lines of six groups.
 */
export function formatSafetyNumberLines(safetyNumber: string): string[] {
  const groups = safetyNumber.split(' ');
  const lines: string[] = [];
  for (let i = 0; i < groups.length; i += SAFETY_NUMBER.GROUPS_PER_LINE) {
    lines.push(groups.slice(i, i + SAFETY_NUMBER.GROUPS_PER_LINE).join(' '));
  }
  return lines;
}

/**
 * Compare a number typed or read aloud by the user with the computed one.
 * Whitespace is ignored.
 */
export function safetyNumbersMatch(expected: string, entered: string): boolean {
  const normalize = (value: string) => value.replace(/\s+/g, '');
  const digits = normalize(entered);
  return /^\d+$/.test(digits) && digits === normalize(expected);
}

/**
 * Lowercase hex SHA-256 of a public key, shown on the "my key" screen.
 */
export async function fingerprint(publicKey: Uint8Array): Promise<string> {
  return bytesToHex(await sha256(publicKey));
}
