import * as crypto from 'crypto';

/**
 * Gravatar-compatible hash: md5 of the trimmed, lower-cased address.
 */
export function hashEmail(email: string): string {
  return crypto.createHash('md5').update(email.trim().toLowerCase()).digest('hex');
}
