/**
 * Credential vault
 *
 * Integration credentials are sealed with AES-256-GCM before they reach the
 * store. Sealed layout (base64): [iv (16)] [authTag (16)] [ciphertext (...)].
 *
 * @module services/credential-vault
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'crypto';
import { z } from 'zod';
import { UnknownError } from '../core/errors';
import type { Credentials } from './integrations/adapter-contract';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const KEY_SALT = 'integration-hub:credentials:v1';

const credentialsSchema = z.record(z.string());

export class CredentialVault {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new Error('CredentialVault requires a non-empty encryption key');
    }
    this.key = scryptSync(secret, KEY_SALT, KEY_LENGTH);
  }

  seal(credentials: Credentials): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([
      cipher.update(JSON.stringify(credentials), 'utf8'),
      cipher.final(),
    ]);
    return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64');
  }

  open(sealed: string): Credentials {
    const data = Buffer.from(sealed, 'base64');
    if (data.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new UnknownError('Sealed credentials are truncated');
    }

    const iv = data.subarray(0, IV_LENGTH);
    const authTag = data.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const ciphertext = data.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    let plaintext: string;
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv);
      decipher.setAuthTag(authTag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch (error) {
      // Wrong key or tampered payload; the cause carries no secret material
      throw new UnknownError('Sealed credentials could not be decrypted', { cause: error });
    }

    const parsed = credentialsSchema.safeParse(JSON.parse(plaintext));
    if (!parsed.success) {
      throw new UnknownError('Sealed credentials have an unexpected shape');
    }
    return parsed.data;
  }
}
