export type CacheKeyPart = string | number | boolean | null | undefined;

/**
 * Colon-joined cache key. Absent parts keep their slot as an empty segment,
 * so `("list", "p", undefined, 20)` and `("list", "p", 20)` never collide.
 */
export function buildCacheKey(prefix: string, ...parts: CacheKeyPart[]): string {
  return [prefix, ...parts.map((part) => (part === null || part === undefined ? '' : String(part)))].join(':');
}

/**
 * Escape Redis glob metacharacters so a user-supplied segment only matches itself.
 */
export function escapeGlob(segment: string): string {
  return segment.replace(/[*?[\]\\]/g, '\\$&');
}
