import { randomBytes } from 'crypto';

let lastMillis = 0;
let sequence = 0;

/**
 * Generate an opaque, time-ordered identifier such as `txn_lx2k9c1a000_9f3b1c7e2a4d6b80`.
 *
 * Millisecond timestamp, a per-process sequence that disambiguates ids minted in
 * the same millisecond, then 64 random bits so separate processes never collide.
 */
export const generateId = (prefix: string): string => {
  const now = Date.now();
  if (now === lastMillis) {
    sequence += 1;
  } else {
    lastMillis = now;
    sequence = 0;
  }

  const time = now.toString(36);
  const seq = sequence.toString(36).padStart(3, '0');
  const random = randomBytes(8).toString('hex');

  return `${prefix}_${time}${seq}_${random}`;
};

export const generateLedgerEntryId = (): string => generateId('txn');

export const generateRedemptionId = (): string => generateId('red');
