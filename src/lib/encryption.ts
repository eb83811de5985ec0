// Sealing of OAuth tokens stored at rest (AES-256-GCM)
import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const PREFIX = 'v1';

export interface TokenCipher {
  seal(plaintext: string): string;
  open(sealed: string): string;
}

/**
 * Create a cipher from a 32-byte hex key.
 * Sealed format: v1:IV:AUTH_TAG:CIPHERTEXT (base64 parts separated by ':')
 */
export function createTokenCipher(hexKey: string): TokenCipher {
  const key = Buffer.from(hexKey, 'hex');
  if (key.length !== 32) {
    throw new Error('Token encryption key must be 32 bytes (64 hex characters)');
  }

  return {
    seal(plaintext: string): string {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
      const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);

      return [
        PREFIX,
        iv.toString('base64'),
        cipher.getAuthTag().toString('base64'),
        ciphertext.toString('base64'),
      ].join(':');
    },

    open(sealed: string): string {
      const parts = sealed.split(':');
      if (parts.length !== 4 || parts[0] !== PREFIX) {
        throw new Error('Invalid sealed token format (expected v1:IV:AUTH_TAG:CIPHERTEXT)');
      }

      const [, ivB64, authTagB64, ciphertextB64] = parts;
      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivB64, 'base64'), {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAuthTag(Buffer.from(authTagB64, 'base64'));

      return Buffer.concat([
        decipher.update(Buffer.from(ciphertextB64, 'base64')),
        decipher.final(),
      ]).toString('utf-8');
    },
  };
}

/** Pass-through used when no key is configured */
export const plainTokenCipher: TokenCipher = {
  seal: (plaintext) => plaintext,
  open: (sealed) => sealed,
};
