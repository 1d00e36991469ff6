/**
 * Stable content hashing for run identifiers
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  return deterministicHash(stableStringify(content));
}

function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(obj).sort(([a], [b]) => a.localeCompare(b));
  return '{' + entries.map(([key, value]) => `${JSON.stringify(key)}:${stableStringify(value)}`).join(',') + '}';
}
