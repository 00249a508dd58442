/**
 * Local public key access
 */

import * as fs from 'fs';
import type { KeyMaterial } from '../types';
import { KeyFileNotFoundError, InvalidKeyFileError } from '../utils/errors';

export interface KeyStore {
  exists(filePath: string): boolean;
  /** Read a file as text, throwing KeyFileNotFoundError when it is absent */
  read(filePath: string): string;
}

export const fsKeyStore: KeyStore = {
  exists(filePath) {
    return fs.existsSync(filePath);
  },

  read(filePath) {
    if (!fs.existsSync(filePath)) {
      throw new KeyFileNotFoundError(filePath);
    }
    return fs.readFileSync(filePath, 'utf-8');
  },
};

/**
 * Extract the base64 key body (second whitespace-delimited field) of a key line.
 * Returns an empty string when the line has fewer than two fields.
 */
export function extractFingerprint(keyLine: string): string {
  const fields = keyLine.trim().split(/\s+/);
  return fields[1] ?? '';
}

/**
 * Public and private paths of a key pair, from either half
 */
export function keyPairPaths(keyPath: string): { privateKeyPath: string; publicKeyPath: string } {
  if (keyPath.endsWith('.pub')) {
    return { privateKeyPath: keyPath.slice(0, -'.pub'.length), publicKeyPath: keyPath };
  }
  return { privateKeyPath: keyPath, publicKeyPath: `${keyPath}.pub` };
}

/**
 * Read a public key file into KeyMaterial
 */
export function loadKeyMaterial(store: KeyStore, filePath: string): KeyMaterial {
  if (!store.exists(filePath)) {
    throw new KeyFileNotFoundError(filePath);
  }

  const content = store
    .read(filePath)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);

  if (!content) {
    throw new InvalidKeyFileError(filePath, 'file is empty');
  }

  if (content.includes('PRIVATE KEY')) {
    throw new InvalidKeyFileError(filePath, 'this is a private key, pass the .pub file instead');
  }

  return {
    path: filePath,
    content,
    fingerprint: extractFingerprint(content),
  };
}
