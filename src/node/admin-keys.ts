import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../core/errors';
import { generateKeyPair, KeyPair, keyPairFromPrivateKey } from '../crypto';

export const ADMIN_KEYS_FILE = 'admin-keys.json';

export function adminKeysPath(dataDir: string): string {
  return path.join(dataDir, ADMIN_KEYS_FILE);
}

export function readAdminKeys(dataDir: string): KeyPair | null {
  const keysFile = adminKeysPath(dataDir);
  if (!fs.existsSync(keysFile)) {
    return null;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(keysFile, 'utf8'));
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('privateKey' in parsed) ||
    typeof parsed.privateKey !== 'string'
  ) {
    throw new ConfigError(`${keysFile} does not contain a private key`);
  }

  return keyPairFromPrivateKey(parsed.privateKey);
}

/**
 * Loads the administrator keys from the data directory, generating and
 * saving a new pair on first start.
 */
export function loadOrCreateAdminKeys(dataDir: string): { keys: KeyPair; created: boolean } {
  const existing = readAdminKeys(dataDir);
  if (existing) {
    return { keys: existing, created: false };
  }

  fs.mkdirSync(dataDir, { recursive: true });
  const keys = generateKeyPair();
  fs.writeFileSync(adminKeysPath(dataDir), JSON.stringify(keys, null, 2), { mode: 0o600 });
  return { keys, created: true };
}
