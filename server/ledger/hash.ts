import { createHash } from 'crypto';
import { SignedTx } from '../../shared/schema';

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }

  if (value && typeof value === 'object') {
    const record = value as Record<string, unknown>;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(record).sort()) {
      if (record[key] === undefined) {
        continue;
      }
      sorted[key] = normalize(record[key]);
    }
    return sorted;
  }

  return value;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hashObject(value: unknown): string {
  return sha256Hex(stableStringify(value));
}

// Covers signatures too, so two txs differing only by signer hash apart.
export function hashTx(tx: SignedTx): string {
  return hashObject(tx).toUpperCase();
}
