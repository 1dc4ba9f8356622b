import { BlockList, isIP } from 'net';
import type { IncomingHttpHeaders } from 'http';

export const UNKNOWN_IP = 'unknown';

// Checked in this order; the first acceptable value wins.
export const IP_HEADERS = [
  'x-forwarded-for',
  'x-real-ip',
  'cf-connecting-ip',
  'x-client-ip',
  'x-forwarded',
  'forwarded-for',
  'forwarded',
] as const;

const nonPublic = new BlockList();
nonPublic.addSubnet('0.0.0.0', 8, 'ipv4');
nonPublic.addSubnet('10.0.0.0', 8, 'ipv4');
nonPublic.addSubnet('127.0.0.0', 8, 'ipv4');
nonPublic.addSubnet('169.254.0.0', 16, 'ipv4');
nonPublic.addSubnet('172.16.0.0', 12, 'ipv4');
nonPublic.addSubnet('192.168.0.0', 16, 'ipv4');
nonPublic.addAddress('::', 'ipv6');
nonPublic.addAddress('::1', 'ipv6');
nonPublic.addSubnet('fc00::', 7, 'ipv6');
nonPublic.addSubnet('fe80::', 10, 'ipv6');

/**
 * Unwrap IPv4-mapped IPv6 addresses (`::ffff:1.2.3.4`) as reported by Node sockets.
 */
export function normalizeIp(ip: string): string {
  const trimmed = ip.trim();
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(trimmed);
  return mapped ? mapped[1] : trimmed;
}

export function isPrivateOrLoopback(ip: string): boolean {
  const normalized = normalizeIp(ip);
  const family = isIP(normalized);
  if (family === 0) return false;
  return nonPublic.check(normalized, family === 4 ? 'ipv4' : 'ipv6');
}

export function isLoopback(ip: string): boolean {
  const normalized = normalizeIp(ip);
  return (
    normalized === 'localhost' ||
    normalized === '::1' ||
    normalized === '0.0.0.0' ||
    (isIP(normalized) === 4 && normalized.startsWith('127.'))
  );
}

/**
 * Best-guess client address: the first public IP announced by a proxy header,
 * otherwise the transport peer.
 */
export function extractClientIp(headers: IncomingHttpHeaders, remoteAddress?: string | null): string {
  for (const header of IP_HEADERS) {
    const raw = headers[header];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (!value) continue;

    const candidate = normalizeIp(value.split(',')[0]);
    if (isIP(candidate) !== 0 && !isPrivateOrLoopback(candidate)) {
      return candidate;
    }
  }

  return remoteAddress ? normalizeIp(remoteAddress) : UNKNOWN_IP;
}
