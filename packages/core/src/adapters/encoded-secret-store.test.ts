import { describe, it, expect } from 'vitest';
import { ConfigError } from '../shared/errors.js';
import { EncodedSecretStore } from './encoded-secret-store.js';

describe('EncodedSecretStore', () => {
  const secrets = new EncodedSecretStore();

  it('should tag the encoded value', () => {
    expect(secrets.encrypt('test-secret')).toBe('b64:dGVzdC1zZWNyZXQ=');
    expect(secrets.decrypt('b64:dGVzdC1zZWNyZXQ=')).toBe('test-secret');
  });

  it('should keep non-ascii keys intact', () => {
    expect(secrets.decrypt(secrets.encrypt('clé-test'))).toBe('clé-test');
  });

  it('should refuse values it did not write', () => {
    expect(() => secrets.decrypt('dGVzdC1zZWNyZXQ=')).toThrow(ConfigError);
    expect(() => secrets.decrypt('b64:not base64!')).toThrow('Saved API key is corrupted; set it again');
    expect(() => secrets.decrypt('b64:abc')).toThrow(ConfigError);
  });
});
