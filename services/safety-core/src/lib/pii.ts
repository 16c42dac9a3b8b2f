/**
 * PII hashing.
 *
 * Student references are replaced by a salted sha256 before they reach a
 * crisis record, the ledger or a log line. Message text is fingerprinted
 * without a salt so the same text can be correlated across audit entries.
 */

import { createHash, randomBytes } from 'crypto';
import { createLogger } from './logger';

const log = createLogger('PII');

export const MIN_SALT_LENGTH = 32;

export function hashPii(value: string, salt: string): string {
  if (salt.length < MIN_SALT_LENGTH) {
    throw new Error(`PII salt must be at least ${MIN_SALT_LENGTH} characters`);
  }
  return createHash('sha256').update(`${salt}${value}`, 'utf8').digest('hex');
}

export function hashTextForAudit(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export type PiiHasher = (value: string) => string;

/**
 * Bind a salt once. Without a configured salt an ephemeral one is generated,
 * so hashes are stable for the process lifetime only.
 */
export function createPiiHasher(salt: string | null): PiiHasher {
  let effectiveSalt = salt;
  if (!effectiveSalt) {
    log.warn('PII_SALT not set, using an ephemeral salt; student hashes will not survive a restart');
    effectiveSalt = randomBytes(32).toString('hex');
  }
  const bound = effectiveSalt;
  return (value) => hashPii(value, bound);
}
