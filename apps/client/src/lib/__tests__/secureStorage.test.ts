import { mkdtemp, readdir, readFile, rename, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EncryptedFileStorage, MemorySecureStorage } from '../secureStorage.js';

const MASTER_KEY = new Uint8Array(32).fill(5);

describe('MemorySecureStorage', () => {
  it('should set, get and delete values', async () => {
    const storage = new MemorySecureStorage();

    expect(await storage.get('a')).toBeNull();
    await storage.set('a', 'one');
    await storage.set('a', 'two');
    expect(await storage.get('a')).toBe('two');
    expect(storage.size).toBe(1);

    await storage.delete('a');
    await storage.delete('a');
    expect(await storage.get('a')).toBeNull();
  });
});

describe('EncryptedFileStorage', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'veilpost-keystore-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should read back what it wrote', async () => {
    const storage = new EncryptedFileStorage(directory, MASTER_KEY);

    await storage.set('e2ee_key_bundle', '{"secret":"value"}');

    expect(await storage.get('e2ee_key_bundle')).toBe('{"secret":"value"}');
    expect(await new EncryptedFileStorage(directory, MASTER_KEY).get('e2ee_key_bundle')).toBe(
      '{"secret":"value"}'
    );
  });

  it('should never write plaintext to disk', async () => {
    const storage = new EncryptedFileStorage(directory, MASTER_KEY);
    await storage.set('peer_identity:bob', 'plain-marker');

    expect(await readdir(directory)).toEqual(['peer_identity%3Abob.sealed']);
    const onDisk = await readFile(join(directory, 'peer_identity%3Abob.sealed'), 'utf8');
    expect(onDisk).not.toContain('plain-marker');
  });

  it('should return null for a missing key and tolerate deleting it', async () => {
    const storage = new EncryptedFileStorage(directory, MASTER_KEY);

    expect(await storage.get('missing')).toBeNull();
    await expect(storage.delete('missing')).resolves.toBeUndefined();
  });

  it('should fail under the wrong master key', async () => {
    await new EncryptedFileStorage(directory, MASTER_KEY).set('k', 'v');

    await expect(
      new EncryptedFileStorage(directory, new Uint8Array(32).fill(6)).get('k')
    ).rejects.toThrow();
  });

  it('should not let one entry stand in for another', async () => {
    const storage = new EncryptedFileStorage(directory, MASTER_KEY);
    await storage.set('a', 'value-a');
    await rename(join(directory, 'a.sealed'), join(directory, 'b.sealed'));

    await expect(storage.get('b')).rejects.toThrow();
  });

  it('should reject a master key of the wrong size', async () => {
    await expect(new EncryptedFileStorage(directory, new Uint8Array(16)).get('k')).rejects.toThrow(
      'Master key must be 32 bytes'
    );
  });
});
