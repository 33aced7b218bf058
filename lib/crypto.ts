import { createHash } from 'crypto';
import { Decimal } from '@/lib/math';

/**
 * Stable JSON text for driver sets: object keys in code-unit order, no
 * whitespace, Decimals written as plain numbers. Two sets holding the same
 * values give the same text whatever order their keys were built in.
 */
export function canonicalize(value: unknown): string {
  if (Decimal.isDecimal(value)) return JSON.stringify(value.toNumber());
  if (value === null || typeof value !== 'object') return JSON.stringify(value);

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const fields = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item)}`);
  return `{${fields.join(',')}}`;
}

/** sha256 of the canonical text; the checksum carried by exported driver sets */
export function computeHash(data: unknown): string {
  return createHash('sha256').update(canonicalize(data)).digest('hex');
}
