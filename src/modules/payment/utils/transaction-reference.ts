import { randomBytes } from 'crypto';

export const TRANSACTION_REFERENCE_PATTERN = /^TXN-\d{8}-[0-9A-F]{16}$/;

const pad = (value: number, width: number) => value.toString().padStart(width, '0');

/**
 * `TXN-<YYYYMMDD>-<16 uppercase hex>`, dated in UTC.
 */
export function generateTransactionReference(
  now: Date = new Date(),
  entropy: Buffer = randomBytes(8),
): string {
  const date = `${pad(now.getUTCFullYear(), 4)}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
  return `TXN-${date}-${entropy.toString('hex').toUpperCase()}`;
}
