import crypto from 'crypto';

export function normalizeText(text: string): string {
  return text.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * Deterministic hash of the normalized (title, content) pair.
 * Used as the score cache and idempotency key.
 */
export function contentFingerprint(title: string, content: string): string {
  return crypto
    .createHash('sha256')
    .update(JSON.stringify([normalizeText(title), normalizeText(content)]))
    .digest('hex');
}

// FNV-1a, 32 bit
export function fnv1a(text: string): number {
  let hash = 2166136261;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}
