import type { SecretStore } from '../ports/secret-store.js';
import { ConfigError } from '../shared/errors.js';

const PREFIX = 'b64:';
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Keeps the API key out of casual view as `b64:<base64>`. This is an encoding,
 * not encryption: anyone who can read the preferences file can recover the key.
 * Set OPENROUTER_API_KEY instead where that matters.
 */
export class EncodedSecretStore implements SecretStore {
  encrypt(value: string): string {
    return PREFIX + Buffer.from(value, 'utf-8').toString('base64');
  }

  decrypt(encrypted: string): string {
    if (!encrypted.startsWith(PREFIX)) {
      throw new ConfigError('Saved API key is not in a recognised format; set it again');
    }
    const payload = encrypted.slice(PREFIX.length);
    if (payload.length % 4 !== 0 || !BASE64.test(payload)) {
      throw new ConfigError('Saved API key is corrupted; set it again');
    }
    return Buffer.from(payload, 'base64').toString('utf-8');
  }
}
