import { createCipheriv, createDecipheriv, randomBytes, scrypt } from 'crypto';
import { promisify } from 'util';
import { config } from '../config/index.js';

const scryptAsync = promisify(scrypt);

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const SALT_LENGTH = 32;
const KEY_LENGTH = 32;

async function deriveKey(masterKey: string, salt: Buffer): Promise<Buffer> {
  const key = await scryptAsync(masterKey, salt, KEY_LENGTH);
  if (!Buffer.isBuffer(key)) {
    throw new Error('Key derivation failed');
  }
  return key;
}

/**
 * Encrypt a string using AES-256-GCM
 * Format: salt:iv:authTag:encrypted (all hex encoded)
 */
export async function encrypt(
  plaintext: string,
  masterKey: string = config.encryption.tokenKey
): Promise<string> {
  if (!plaintext) {
    throw new Error('Cannot encrypt empty string');
  }

  const salt = randomBytes(SALT_LENGTH);
  const key = await deriveKey(masterKey, salt);
  const iv = randomBytes(IV_LENGTH);

  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });

  let encrypted = cipher.update(plaintext, 'utf8', 'hex');
  encrypted += cipher.final('hex');

  const authTag = cipher.getAuthTag();

  return [
    salt.toString('hex'),
    iv.toString('hex'),
    authTag.toString('hex'),
    encrypted,
  ].join(':');
}

/**
 * Decrypt a string encrypted with AES-256-GCM
 */
export async function decrypt(
  encryptedData: string,
  masterKey: string = config.encryption.tokenKey
): Promise<string> {
  if (!encryptedData) {
    throw new Error('Cannot decrypt empty string');
  }

  const parts = encryptedData.split(':');
  if (parts.length !== 4) {
    throw new Error('Invalid encrypted data format');
  }

  const [saltHex, ivHex, authTagHex, encrypted] = parts;

  const salt = Buffer.from(saltHex, 'hex');
  const key = await deriveKey(masterKey, salt);
  const iv = Buffer.from(ivHex, 'hex');
  const authTag = Buffer.from(authTagHex, 'hex');

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  let decrypted = decipher.update(encrypted, 'hex', 'utf8');
  decrypted += decipher.final('utf8');

  return decrypted;
}

/**
 * Generate a secure random token, URL safe.
 * 32 bytes gives 256 bits of entropy.
 */
export function generateSecureToken(bytes: number = 32): string {
  return randomBytes(bytes).toString('base64url');
}
