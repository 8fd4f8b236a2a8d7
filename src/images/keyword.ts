export const FALLBACK_KEYWORD_KEY = 'image';

/**
 * Maps free-form search text to the filesystem-safe key used to name both
 * cache tiers, e.g. "Gaming Laptops!" -> "gaming_laptops".
 */
export function sanitizeKeyword(keyword: string): string {
  const key = keyword
    .trim()
    .toLowerCase()
    .replace(/\s/g, '_')
    .replace(/[^a-z0-9_-]/g, '');
  return key || FALLBACK_KEYWORD_KEY;
}
