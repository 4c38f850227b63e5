import { createHash } from 'crypto';

/**
 * Canonical JSON stringification for deterministic hashing.
 * - Sorts object keys alphabetically
 * - Removes undefined values
 * - Uses consistent formatting (no extra whitespace)
 */
export function canonicalStringify(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      const sorted: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (entry !== undefined) {
          sorted[key] = entry;
        }
      }
      return sorted;
    }
    return value;
  });
}

/**
 * Compute SHA-256 hash of canonically stringified data.
 * Returns hash in format: "sha256:<hex>"
 */
export function computeConfigHash(config: unknown): string {
  const hash = createHash('sha256').update(canonicalStringify(config)).digest('hex');
  return `sha256:${hash}`;
}
