import { encrypt, decrypt, generateSecureToken } from '../utils/encryption.js';
import { AppError, toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Ciphertext columns as stored on an integration row */
export interface SealedTokens {
  accessTokenEncrypted: string;
  refreshTokenEncrypted: string | null;
}

export interface DecryptedTokens {
  accessToken: string;
  refreshToken?: string;
}

export class CredentialsUnreadableError extends AppError {
  constructor(reason: string) {
    super('Stored credentials could not be decrypted', 'CREDENTIALS_UNREADABLE', 500, false, { reason });
  }
}

/**
 * Seals provider tokens under the token master key and issues the random
 * values used as OAuth state.
 */
export class EncryptionService {
  constructor(private readonly masterKey?: string) {}

  async seal(tokens: { accessToken: string; refreshToken?: string }): Promise<SealedTokens> {
    const [accessTokenEncrypted, refreshTokenEncrypted] = await Promise.all([
      encrypt(tokens.accessToken, this.masterKey),
      tokens.refreshToken ? encrypt(tokens.refreshToken, this.masterKey) : Promise.resolve(null),
    ]);
    return { accessTokenEncrypted, refreshTokenEncrypted };
  }

  /**
   * A row whose ciphertext no longer opens (key changed, value tampered with)
   * is reported, never retried.
   */
  async open(sealed: SealedTokens): Promise<DecryptedTokens> {
    try {
      const accessToken = await decrypt(sealed.accessTokenEncrypted, this.masterKey);
      if (!sealed.refreshTokenEncrypted) {
        return { accessToken };
      }
      return { accessToken, refreshToken: await decrypt(sealed.refreshTokenEncrypted, this.masterKey) };
    } catch (error) {
      logger.error('Failed to decrypt stored credentials', { error: toErrorMessage(error) });
      throw new CredentialsUnreadableError(toErrorMessage(error));
    }
  }

  /** 256 bits, URL safe */
  newState(): string {
    return generateSecureToken(32);
  }
}

export const encryptionService = new EncryptionService();
