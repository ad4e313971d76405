import { z } from 'zod';
import { ValidationError } from '../../types/errors';
import type { ScanPage } from './drainPages';

const ScanKeySchema = z.object({ after: z.string().min(1) });

/**
 * Continuation keys are base64url JSON so callers treat them as opaque.
 */
export function encodeScanKey(after: string): string {
  return Buffer.from(JSON.stringify({ after }), 'utf8').toString('base64url');
}

export function decodeScanKey(key: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(key, 'base64url').toString('utf8'));
  } catch (err) {
    throw new ValidationError('Invalid scan continuation key', { reason: String(err) });
  }
  const parsed = ScanKeySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Invalid scan continuation key', { issues: parsed.error.issues });
  }
  return parsed.data.after;
}

/**
 * Build a page from rows sorted by key, fetched with one extra row
 * so the presence of a next page is known without another query.
 */
export function toScanPage<T>(rows: T[], limit: number, keyOf: (row: T) => string): ScanPage<T> {
  if (rows.length <= limit) {
    return { items: rows };
  }
  const items = rows.slice(0, limit);
  const last = items[items.length - 1];
  return last === undefined ? { items } : { items, lastEvaluatedKey: encodeScanKey(keyOf(last)) };
}
