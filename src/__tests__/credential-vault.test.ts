import { describe, it, expect } from 'vitest';
import { CredentialVault } from '../services/credential-vault';
import { UnknownError } from '../core/errors';

describe('CredentialVault', () => {
  const vault = new CredentialVault('test-secret');
  const credentials = { apiKey: 'test-key', apiSecret: 'test-api-secret' };

  it('opens what it sealed', () => {
    expect(vault.open(vault.seal(credentials))).toEqual(credentials);
  });

  it('never stores credentials in the clear', () => {
    const sealed = vault.seal(credentials);
    const decoded = Buffer.from(sealed, 'base64').toString('utf8');
    expect(decoded).not.toContain('test-api-secret');
  });

  it('uses a fresh IV per seal', () => {
    expect(vault.seal(credentials)).not.toBe(vault.seal(credentials));
  });

  it('refuses to open with a different key', () => {
    const other = new CredentialVault('another-test-secret');
    expect(() => other.open(vault.seal(credentials))).toThrow('Sealed credentials could not be decrypted');
  });

  it('detects tampering through the auth tag', () => {
    const data = Buffer.from(vault.seal(credentials), 'base64');
    data[data.length - 1] ^= 0xff;
    expect(() => vault.open(data.toString('base64'))).toThrow(UnknownError);
  });

  it('rejects truncated input', () => {
    expect(() => vault.open(Buffer.alloc(10).toString('base64'))).toThrow('Sealed credentials are truncated');
  });

  it('requires a non-empty key', () => {
    expect(() => new CredentialVault('')).toThrow('CredentialVault requires a non-empty encryption key');
  });
});
