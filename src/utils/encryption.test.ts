import { describe, expect, it } from 'vitest';
import { decrypt, encrypt, generateSecureToken } from './encryption.js';

describe('encryption', () => {
  it('should decrypt what it encrypted', async () => {
    const ciphertext = await encrypt('test-access-token');

    expect(ciphertext).not.toContain('test-access-token');
    expect(ciphertext.split(':')).toHaveLength(4);
    await expect(decrypt(ciphertext)).resolves.toBe('test-access-token');
  });

  it('should produce different ciphertext for the same plaintext', async () => {
    const first = await encrypt('same-token');
    const second = await encrypt('same-token');

    expect(first).not.toBe(second);
  });

  it('should reject ciphertext encrypted under another key', async () => {
    const ciphertext = await encrypt('test-access-token', 'another-test-key');

    await expect(decrypt(ciphertext)).rejects.toThrow();
  });

  it('should reject tampered ciphertext', async () => {
    const [salt, iv, tag, body] = (await encrypt('test-access-token')).split(':');
    const flipped = body.startsWith('0') ? `1${body.slice(1)}` : `0${body.slice(1)}`;

    await expect(decrypt([salt, iv, tag, flipped].join(':'))).rejects.toThrow();
  });

  it('should reject malformed input', async () => {
    await expect(encrypt('')).rejects.toThrow('Cannot encrypt empty string');
    await expect(decrypt('not-encrypted')).rejects.toThrow('Invalid encrypted data format');
  });

  it('should generate url-safe tokens of the requested entropy', () => {
    const token = generateSecureToken(32);

    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateSecureToken(32)).not.toBe(token);
  });
});
