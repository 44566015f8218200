import crypto from 'node:crypto';
import type { RecordKind } from '../types/record.js';

/**
 * Content key for records without a site-native id.
 * Same kind + name (case-insensitive) + normalized date = same key.
 */
export function computeContentKey(p: { kind: RecordKind; name: string | null; date: string | null }): string {
  const raw = `${p.kind}|${(p.name ?? '').toLowerCase().trim()}|${p.date ?? 'unknown'}`;
  return crypto.createHash('sha256').update(raw).digest('hex').slice(0, 32);
}

/** Record id derived from a content key, used until (unless) a native id turns up. */
export function contentRecordId(kind: RecordKind, contentKey: string): string {
  return `${kind}:${contentKey}`;
}
