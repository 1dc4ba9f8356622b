export const UNKNOWN_SYSTEM = 'unknown';
export const OTHER_SYSTEM = 'other';

// First match wins. Mobile platforms come first: iOS agents carry "Mac OS X"
// and Android agents carry "Linux".
const SYSTEM_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/iPhone|iPad|iPod/i, 'iOS'],
  [/Android/i, 'Android'],
  [/Windows NT|Windows/i, 'Windows'],
  [/Macintosh|Mac OS X|macOS/i, 'macOS'],
  [/Linux|Ubuntu|CentOS|Debian|Fedora/i, 'Linux'],
];

export function detectSystem(userAgent: string | null | undefined): string {
  const ua = userAgent?.trim();
  if (!ua) {
    return UNKNOWN_SYSTEM;
  }

  for (const [pattern, system] of SYSTEM_PATTERNS) {
    if (pattern.test(ua)) {
      return system;
    }
  }

  return OTHER_SYSTEM;
}
