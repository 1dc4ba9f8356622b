import spamKeywords from '../config/spam-keywords.json';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Trim and escape markup-significant characters. Stored content is always the escaped form.
 */
export function sanitizeContent(content: string): string {
  return content.trim().replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Distinct blacklist terms found in the content (case-insensitive substring match).
 */
export function findSpamTerms(content: string, keywords: readonly string[] = spamKeywords): string[] {
  const haystack = content.toLowerCase();
  const found = new Set<string>();

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    if (needle && haystack.includes(needle)) {
      found.add(needle);
    }
  }

  return Array.from(found);
}

export function isSpam(content: string, threshold: number, keywords?: readonly string[]): boolean {
  return findSpamTerms(content, keywords).length >= threshold;
}
