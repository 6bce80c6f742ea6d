/** Reversible encoding for the API key kept in preferences. */
export interface SecretStore {
  encrypt(value: string): string;
  decrypt(encrypted: string): string;
}
