/**
 * Credential Policy
 * 
 * An explicit password is used on its own. Without one, the configured
 * private keys that exist on disk are tried in order.
 */

import { readFile } from 'node:fs/promises';
import { pathExists } from '@clipferry/utils';

export interface TransferCredentials {
  username: string;
  password?: string;
  keyCandidates: readonly string[];
}

export type AuthCandidate =
  | { kind: 'password'; password: string }
  | { kind: 'key'; keyPath: string; privateKey: Buffer };

/**
 * Key candidates present on disk, order preserved
 */
export async function existingKeys(keyCandidates: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  for (const keyPath of keyCandidates) {
    if (await pathExists(keyPath)) {
      found.push(keyPath);
    }
  }
  return found;
}

export async function resolveAuthCandidates(
  credentials: TransferCredentials
): Promise<AuthCandidate[]> {
  if (credentials.password !== undefined) {
    return [{ kind: 'password', password: credentials.password }];
  }

  const candidates: AuthCandidate[] = [];
  for (const keyPath of await existingKeys(credentials.keyCandidates)) {
    candidates.push({ kind: 'key', keyPath, privateKey: await readFile(keyPath) });
  }
  return candidates;
}

export function describeCandidate(candidate: AuthCandidate): string {
  return candidate.kind === 'password' ? 'password' : `key ${candidate.keyPath}`;
}
